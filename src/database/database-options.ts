import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { initialSchema1760774400000 } from './migrations/1760774400000-initialSchema';

export const migrations = [initialSchema1760774400000];

export const buildTypeOrmOptions = (
  configService: ConfigService,
): TypeOrmModuleOptions => {
  if (configService.get<string>('DATABASE_TYPE') === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: configService.get<string>('SQLITE_DATABASE', ':memory:'),
      autoLoadEntities: true,
      synchronize: true,
    };
  }

  return {
    type: 'postgres',
    host: configService.get<string>('POSTGRES_HOST'),
    port: configService.get<number>('POSTGRES_PORT'),
    username: configService.get<string>('POSTGRES_USER'),
    password: configService.get<string>('POSTGRES_PASSWORD'),
    database: configService.get<string>('POSTGRES_DB'),
    autoLoadEntities: true,
    synchronize: configService.get<boolean>('DATABASE_SYNCHRONIZE', false),
    migrations,
    migrationsRun: true,
  };
};
