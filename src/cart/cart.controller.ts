import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser } from '../auth/decorators';
import { JwtAuthGuard } from '../auth/guards';
import { IAuthUser } from '../auth/interfaces';
import { CartService } from './cart.service';
import { SetCartItemQuantityDto } from './dto';
import { ICartResponse } from './interfaces';

@Controller('cart')
@UseGuards(JwtAuthGuard)
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get()
  async getCart(@CurrentUser() user: IAuthUser): Promise<ICartResponse> {
    return this.cartService.getCart(user.id);
  }

  @Post('items/:menuItemId/increment')
  @HttpCode(HttpStatus.OK)
  async incrementItem(
    @CurrentUser() user: IAuthUser,
    @Param('menuItemId', ParseIntPipe) menuItemId: number,
  ): Promise<ICartResponse> {
    return this.cartService.incrementItem(user.id, menuItemId);
  }

  @Post('items/:menuItemId/decrement')
  @HttpCode(HttpStatus.OK)
  async decrementItem(
    @CurrentUser() user: IAuthUser,
    @Param('menuItemId', ParseIntPipe) menuItemId: number,
  ): Promise<ICartResponse> {
    return this.cartService.decrementItem(user.id, menuItemId);
  }

  @Put('items/:menuItemId')
  async setItemQuantity(
    @CurrentUser() user: IAuthUser,
    @Param('menuItemId', ParseIntPipe) menuItemId: number,
    @Body() setCartItemQuantityDto: SetCartItemQuantityDto,
  ): Promise<ICartResponse> {
    return this.cartService.setItemQuantity(
      user.id,
      menuItemId,
      setCartItemQuantityDto.quantity,
    );
  }

  @Delete()
  async clearCart(@CurrentUser() user: IAuthUser): Promise<ICartResponse> {
    return this.cartService.clearCart(user.id);
  }
}
