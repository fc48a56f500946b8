import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DEFAULT_TIMEZONE } from '../constants';
import { MenuItem } from '../menu/entities';
import { Order, OrderItem } from '../order/entities';
import { toOrderView } from '../order/helpers';
import { IOrder } from '../order/interfaces';
import { OrderService } from '../order/order.service';
import { errorMessage } from '../shared/helpers';
import {
  buildDashboardStats,
  countCustomerTypes,
  renderOrdersCsv,
  renderOrdersPdf,
  summarizePopularItems,
} from './helpers';
import {
  IAnalyticsResponse,
  IDashboardResponse,
  IExportFile,
  IExportResponse,
} from './interfaces';

@Injectable()
export class AdminService {
  private readonly logger = new Logger('AdminService');
  private readonly timezone: string;

  constructor(
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    @InjectRepository(OrderItem)
    private orderItemRepository: Repository<OrderItem>,
    @InjectRepository(MenuItem)
    private menuItemRepository: Repository<MenuItem>,
    private orderService: OrderService,
    configService: ConfigService,
  ) {
    this.timezone = configService.get<string>('APP_TIMEZONE', DEFAULT_TIMEZONE);
  }

  async getDashboard(): Promise<IDashboardResponse> {
    try {
      const [totalOrders, revenue, menuItems] = await Promise.all([
        this.orderRepository.count(),
        this.orderRepository.sum('totalAmount'),
        this.menuItemRepository.count(),
      ]);
      return {
        status: HttpStatus.OK,
        message: 'Dashboard fetched successfully',
        stats: buildDashboardStats(totalOrders, revenue ?? 0, menuItems),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        stats: null,
      };
    }
  }

  async getAnalytics(): Promise<IAnalyticsResponse> {
    try {
      const [orders, orderItems] = await Promise.all([
        this.orderRepository.find({ select: { id: true, customerType: true } }),
        this.orderItemRepository.find({
          select: { id: true, name: true, quantity: true },
        }),
      ]);
      return {
        status: HttpStatus.OK,
        message: orders.length
          ? 'Analytics fetched successfully'
          : 'No data yet',
        analytics: {
          popularItems: summarizePopularItems(orderItems),
          customerDistribution: countCustomerTypes(orders),
        },
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        analytics: null,
      };
    }
  }

  async exportOrdersCsv(): Promise<IExportResponse> {
    return this.exportOrders(async (orders) => ({
      content: Buffer.from(renderOrdersCsv(orders), 'utf8'),
      fileName: 'orders.csv',
      contentType: 'text/csv',
    }));
  }

  async exportOrdersPdf(): Promise<IExportResponse> {
    return this.exportOrders(async (orders) => ({
      content: await renderOrdersPdf(orders),
      fileName: 'orders.pdf',
      contentType: 'application/pdf',
    }));
  }

  private async exportOrders(
    render: (orders: IOrder[]) => Promise<IExportFile>,
  ): Promise<IExportResponse> {
    try {
      const orders = await this.orderService.getAllOrders();
      if (orders.length === 0) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'No orders yet',
          file: null,
        };
      }
      const file = await render(
        orders.map((order) => toOrderView(order, this.timezone)),
      );
      this.logger.log(`${orders.length} orders exported to ${file.fileName}`);
      return {
        status: HttpStatus.OK,
        message: 'Orders exported successfully',
        file,
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        file: null,
      };
    }
  }
}
