import { ConfigService } from '@nestjs/config';
import { buildTypeOrmOptions, migrations } from './database-options';

describe('buildTypeOrmOptions', () => {
  //? Process env wins over values handed to ConfigService
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.DATABASE_TYPE;
    delete process.env.SQLITE_DATABASE;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it('synchronizes an in-memory sqlite database', () => {
    const options = buildTypeOrmOptions(
      new ConfigService({
        DATABASE_TYPE: 'better-sqlite3',
        SQLITE_DATABASE: ':memory:',
      }),
    );

    expect(options).toEqual({
      type: 'better-sqlite3',
      database: ':memory:',
      autoLoadEntities: true,
      synchronize: true,
    });
  });

  it('runs migrations against postgres', () => {
    const options = buildTypeOrmOptions(
      new ConfigService({
        DATABASE_TYPE: 'postgres',
        POSTGRES_HOST: 'localhost',
        POSTGRES_PORT: 5432,
        POSTGRES_USER: 'bytebite',
        POSTGRES_PASSWORD: 'test-secret',
        POSTGRES_DB: 'bytebite',
      }),
    );

    expect(options).toEqual({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'bytebite',
      password: 'test-secret',
      database: 'bytebite',
      autoLoadEntities: true,
      synchronize: false,
      migrations,
      migrationsRun: true,
    });
  });
});
