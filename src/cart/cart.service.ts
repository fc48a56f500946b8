import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MenuItem } from '../menu/entities';
import { errorMessage } from '../shared/helpers';
import { CartItem } from './entities';
import { buildCartSummary } from './helpers';
import { ICartResponse } from './interfaces';

@Injectable()
export class CartService {
  private readonly logger = new Logger('CartService');

  constructor(
    @InjectRepository(CartItem)
    private cartItemRepository: Repository<CartItem>,
    @InjectRepository(MenuItem)
    private menuItemRepository: Repository<MenuItem>,
  ) {}

  findCartItems(userId: string): Promise<CartItem[]> {
    return this.cartItemRepository
      .createQueryBuilder('cartItem')
      .innerJoinAndSelect('cartItem.menuItem', 'menuItem')
      .where('cartItem.userId = :userId', { userId })
      .orderBy('cartItem.id', 'ASC')
      .getMany();
  }

  private async respondWithCart(
    userId: string,
    message: string,
  ): Promise<ICartResponse> {
    const cartItems = await this.findCartItems(userId);
    return {
      status: HttpStatus.OK,
      message,
      cart: buildCartSummary(cartItems),
    };
  }

  private failure(error: unknown): ICartResponse {
    this.logger.error(error);
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message: errorMessage(error),
      cart: null,
    };
  }

  async getCart(userId: string): Promise<ICartResponse> {
    try {
      return await this.respondWithCart(userId, 'Cart fetched successfully');
    } catch (error) {
      return this.failure(error);
    }
  }

  async incrementItem(
    userId: string,
    menuItemId: number,
  ): Promise<ICartResponse> {
    try {
      const menuItem = await this.menuItemRepository.findOneBy({
        id: menuItemId,
      });
      if (!menuItem) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Menu item not found',
          cart: null,
        };
      }

      const cartItem = await this.cartItemRepository.findOneBy({
        userId,
        menuItemId,
      });
      if (cartItem) {
        cartItem.quantity += 1;
        await this.cartItemRepository.save(cartItem);
      } else {
        await this.cartItemRepository.save(
          this.cartItemRepository.create({ userId, menuItemId, quantity: 1 }),
        );
      }
      return await this.respondWithCart(userId, 'Item added to cart');
    } catch (error) {
      return this.failure(error);
    }
  }

  async decrementItem(
    userId: string,
    menuItemId: number,
  ): Promise<ICartResponse> {
    try {
      const cartItem = await this.cartItemRepository.findOneBy({
        userId,
        menuItemId,
      });
      if (!cartItem) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Item is not in the cart',
          cart: null,
        };
      }

      // Quantity never drops to zero: the line goes away instead
      if (cartItem.quantity > 1) {
        cartItem.quantity -= 1;
        await this.cartItemRepository.save(cartItem);
      } else {
        await this.cartItemRepository.remove(cartItem);
      }
      return await this.respondWithCart(userId, 'Item removed from cart');
    } catch (error) {
      return this.failure(error);
    }
  }

  async setItemQuantity(
    userId: string,
    menuItemId: number,
    quantity: number,
  ): Promise<ICartResponse> {
    try {
      const cartItem = await this.cartItemRepository.findOneBy({
        userId,
        menuItemId,
      });

      if (quantity === 0) {
        if (cartItem) await this.cartItemRepository.remove(cartItem);
        return await this.respondWithCart(userId, 'Cart updated');
      }

      const menuItem = await this.menuItemRepository.findOneBy({
        id: menuItemId,
      });
      if (!menuItem) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Menu item not found',
          cart: null,
        };
      }

      await this.cartItemRepository.save(
        cartItem
          ? Object.assign(cartItem, { quantity })
          : this.cartItemRepository.create({ userId, menuItemId, quantity }),
      );
      return await this.respondWithCart(userId, 'Cart updated');
    } catch (error) {
      return this.failure(error);
    }
  }

  async clearCart(userId: string): Promise<ICartResponse> {
    try {
      await this.cartItemRepository.delete({ userId });
      return {
        status: HttpStatus.OK,
        message: 'Cart cleared',
        cart: { lines: [], total: 0 },
      };
    } catch (error) {
      return this.failure(error);
    }
  }
}
