import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { CurrentUser } from '../auth/decorators';
import { JwtAuthGuard } from '../auth/guards';
import { IAuthUser } from '../auth/interfaces';
import { PlaceOrderDto } from './dto';
import { IOrderResponse, IOrdersResponse } from './interfaces';
import { OrderService } from './order.service';

@Controller('orders')
@UseGuards(JwtAuthGuard)
export class OrderController {
  constructor(private readonly orderService: OrderService) {}

  @Post()
  async placeOrder(
    @CurrentUser() user: IAuthUser,
    @Body() placeOrderDto: PlaceOrderDto,
  ): Promise<IOrderResponse> {
    return this.orderService.placeOrder(user, placeOrderDto);
  }

  @Get('mine')
  async getMyOrders(@CurrentUser() user: IAuthUser): Promise<IOrdersResponse> {
    return this.orderService.getOrdersOfUser(user);
  }
}
