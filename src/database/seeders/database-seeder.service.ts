import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import * as path from 'path';
import { DataSource } from 'typeorm';
import { DefaultDataSeeder } from './default-data.seed';
import { FakeOrdersSeeder } from './fake-orders.seed';
import { Seeder } from './seeder.interface';

@Injectable()
export class DatabaseSeederService implements OnApplicationBootstrap {
  private readonly logger = new Logger('DatabaseSeederService');

  constructor(
    @InjectDataSource()
    private dataSource: DataSource,
    private configService: ConfigService,
  ) {}

  async onApplicationBootstrap() {
    const seeders: Seeder[] = [];
    if (this.configService.get<boolean>('SEED_DEFAULT_DATA', true)) {
      seeders.push(
        new DefaultDataSeeder(
          path.resolve(this.configService.get<string>('IMAGES_DIR', 'images')),
        ),
      );
    }
    seeders.push(
      new FakeOrdersSeeder(this.configService.get<number>('SEED_FAKE_ORDERS', 0)),
    );

    for (const seeder of seeders) {
      try {
        await seeder.run(this.dataSource);
      } catch (error) {
        this.logger.error(error);
        throw error;
      }
    }
  }
}
