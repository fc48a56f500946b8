import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { CartItem } from '../cart/entities';
import { Order, OrderItem } from './entities';
import { OrderController } from './order.controller';
import { OrderService } from './order.service';

@Module({
  imports: [
    CacheModule,
    TypeOrmModule.forFeature([Order, OrderItem, CartItem]),
  ],
  controllers: [OrderController],
  providers: [OrderService],
  exports: [OrderService],
})
export class OrderModule {}
