import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MenuItem } from '../menu/entities';
import { CartController } from './cart.controller';
import { CartService } from './cart.service';
import { CartItem } from './entities';

@Module({
  imports: [TypeOrmModule.forFeature([CartItem, MenuItem])],
  controllers: [CartController],
  providers: [CartService],
  exports: [CartService],
})
export class CartModule {}
