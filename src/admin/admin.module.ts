import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MenuItem } from '../menu/entities';
import { MenuModule } from '../menu/menu.module';
import { Order, OrderItem } from '../order/entities';
import { OrderModule } from '../order/order.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [
    MenuModule,
    OrderModule,
    TypeOrmModule.forFeature([Order, OrderItem, MenuItem]),
  ],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
