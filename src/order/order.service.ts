import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, QueryRunner, Repository } from 'typeorm';
import { IAuthUser } from '../auth/interfaces';
import { CacheService } from '../cache/cache.service';
import { CartItem } from '../cart/entities';
import { DEFAULT_TIMEZONE, POPULAR_ITEMS_CACHE_PREFIX } from '../constants';
import { errorMessage } from '../shared/helpers';
import { IResponse } from '../shared/interfaces';
import { PlaceOrderDto } from './dto';
import { Order, OrderItem } from './entities';
import { CustomerType } from './enums';
import {
  calculateOrderTotal,
  createOrderItemFromCart,
  toOrderView,
} from './helpers';
import { IOrderResponse, IOrdersResponse } from './interfaces';

const DEFAULT_ORDER_LIST_LIMIT = 10;

@Injectable()
export class OrderService {
  private readonly logger = new Logger('OrderService');
  private readonly timezone: string;

  constructor(
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    @InjectDataSource()
    private dataSource: DataSource,
    private cacheService: CacheService,
    configService: ConfigService,
  ) {
    this.timezone = configService.get<string>('APP_TIMEZONE', DEFAULT_TIMEZONE);
  }

  async placeOrder(
    authUser: IAuthUser,
    placeOrderDto: PlaceOrderDto,
  ): Promise<IOrderResponse> {
    const customerName = placeOrderDto.customerName?.trim() ?? '';
    if (!customerName) {
      return {
        status: HttpStatus.BAD_REQUEST,
        message: 'Please enter your name',
        order: null,
      };
    }

    let queryRunner: QueryRunner | undefined;
    try {
      queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      const cartItems = await queryRunner.manager
        .createQueryBuilder(CartItem, 'cartItem')
        .innerJoinAndSelect('cartItem.menuItem', 'menuItem')
        .where('cartItem.userId = :userId', { userId: authUser.id })
        .orderBy('cartItem.id', 'ASC')
        .getMany();

      if (cartItems.length === 0) {
        await queryRunner.rollbackTransaction();
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Cart is empty',
          order: null,
        };
      }

      // Snapshot name and price so later menu edits leave the order intact
      const order = new Order();
      order.userId = authUser.id;
      order.customerName = customerName;
      order.customerType = placeOrderDto.customerType ?? CustomerType.STUDENT;
      order.orderItems = cartItems.map(createOrderItemFromCart);
      order.totalAmount = calculateOrderTotal(order.orderItems);

      await queryRunner.manager.save(Order, order);
      await queryRunner.manager.delete(CartItem, { userId: authUser.id });
      await queryRunner.commitTransaction();

      this.cacheService.delByPrefix(POPULAR_ITEMS_CACHE_PREFIX);
      this.logger.log(order.id, 'order placed');
      return {
        status: HttpStatus.CREATED,
        message: `Order #${order.id} placed successfully!`,
        order: toOrderView(order, this.timezone),
      };
    } catch (error) {
      this.logger.error(error);
      if (queryRunner?.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        order: null,
      };
    } finally {
      await queryRunner?.release();
    }
  }

  async getOrdersOfUser(authUser: IAuthUser): Promise<IOrdersResponse> {
    try {
      const orders = await this.orderRepository.find({
        where: { userId: authUser.id },
        relations: { orderItems: true },
        order: { id: 'DESC', orderItems: { id: 'ASC' } },
      });
      return {
        status: HttpStatus.OK,
        message: 'Orders fetched successfully',
        orders: orders.map((order) => toOrderView(order, this.timezone)),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        orders: null,
      };
    }
  }

  async getRecentOrders(
    limit = DEFAULT_ORDER_LIST_LIMIT,
  ): Promise<IOrdersResponse> {
    try {
      const orders = await this.orderRepository.find({
        relations: { orderItems: true },
        order: { id: 'DESC', orderItems: { id: 'ASC' } },
        take: limit,
      });
      return {
        status: HttpStatus.OK,
        message: orders.length ? 'Orders fetched successfully' : 'No orders yet',
        orders: orders.map((order) => toOrderView(order, this.timezone)),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        orders: null,
      };
    }
  }

  async getAllOrders(): Promise<Order[]> {
    return this.orderRepository.find({
      relations: { orderItems: true },
      order: { id: 'ASC', orderItems: { id: 'ASC' } },
    });
  }

  async deleteOrder(orderId: number): Promise<IResponse> {
    let queryRunner: QueryRunner | undefined;
    try {
      const order = await this.orderRepository.findOne({
        where: { id: orderId },
        relations: { orderItems: true },
      });
      if (!order) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Order not found',
        };
      }

      queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();
      await queryRunner.manager.remove(OrderItem, order.orderItems);
      await queryRunner.manager.remove(Order, order);
      await queryRunner.commitTransaction();

      this.cacheService.delByPrefix(POPULAR_ITEMS_CACHE_PREFIX);
      this.logger.log(orderId, 'order deleted');
      return {
        status: HttpStatus.OK,
        message: `Order #${orderId} deleted`,
      };
    } catch (error) {
      this.logger.error(error);
      if (queryRunner?.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
      };
    } finally {
      await queryRunner?.release();
    }
  }
}
