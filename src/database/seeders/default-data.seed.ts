import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { DataSource } from 'typeorm';
import { User } from '../../auth/entities';
import { Role } from '../../auth/enums';
import { hashPassword } from '../../auth/helpers';
import { MenuItem } from '../../menu/entities';
import defaultMenu from './data/default-menu.json';
import { Seeder } from './seeder.interface';

export const DEMO_ACCOUNTS = [
  { username: 'admin', password: 'admin123', role: Role.ADMIN },
  { username: 'user', password: 'user123', role: Role.USER },
];

export class DefaultDataSeeder implements Seeder {
  private readonly logger = new Logger('DefaultDataSeeder');

  constructor(private readonly imagesDir: string) {}

  public async run(dataSource: DataSource): Promise<void> {
    await this.seedUsers(dataSource);
    await this.seedMenu(dataSource);
  }

  private async seedUsers(dataSource: DataSource) {
    const userRepository = dataSource.getRepository(User);
    if ((await userRepository.count()) > 0) return;

    for (const { username, password, role } of DEMO_ACCOUNTS) {
      await userRepository.save(
        userRepository.create({
          username,
          passwordHash: await hashPassword(password),
          role,
        }),
      );
    }
    this.logger.log(`seeded ${DEMO_ACCOUNTS.length} demo accounts`);
  }

  private async seedMenu(dataSource: DataSource) {
    const menuItemRepository = dataSource.getRepository(MenuItem);
    if ((await menuItemRepository.count()) > 0) return;

    //? One by one so ids follow the declared order
    for (const { imageFile, ...dish } of defaultMenu) {
      await menuItemRepository.save(
        menuItemRepository.create({
          ...dish,
          imageFile: (await this.imageExists(imageFile)) ? imageFile : null,
        }),
      );
    }
    this.logger.log(`seeded ${defaultMenu.length} default dishes`);
  }

  private async imageExists(imageFile: string): Promise<boolean> {
    try {
      await fs.access(path.join(this.imagesDir, imageFile));
      return true;
    } catch {
      return false;
    }
  }
}
