import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { MenuItem } from '../../menu/entities';
import { Order } from '../../order/entities';
import { makeOrder } from '../factories';
import { Seeder } from './seeder.interface';

export class FakeOrdersSeeder implements Seeder {
  private readonly logger = new Logger('FakeOrdersSeeder');

  constructor(private readonly count: number) {}

  public async run(dataSource: DataSource): Promise<void> {
    const orderRepository = dataSource.getRepository(Order);
    if (this.count <= 0 || (await orderRepository.count()) > 0) return;

    const menuItems = await dataSource.getRepository(MenuItem).find();
    if (menuItems.length === 0) {
      this.logger.warn('menu is empty, skipping fake orders');
      return;
    }

    for (let i = 0; i < this.count; i++) {
      await orderRepository.save(makeOrder(menuItems));
    }
    this.logger.log(`seeded ${this.count} fake orders`);
  }
}
