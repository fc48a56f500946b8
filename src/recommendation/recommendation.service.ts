import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CacheService } from '../cache/cache.service';
import { POPULAR_ITEMS_CACHE_PREFIX } from '../constants';
import { MenuItem } from '../menu/entities';
import { toMenuItemView } from '../menu/helpers';
import { IMenuItem } from '../menu/interfaces';
import { Order, OrderItem } from '../order/entities';
import { errorMessage } from '../shared/helpers';
import {
  DEFAULT_RECOMMENDATION_LIMIT,
  IOrderedQuantity,
  rankBudgetFriendlyItems,
  rankHighlyRatedItems,
  rankPopularItems,
} from './helpers';
import { IRecommendationsResponse } from './interfaces';

@Injectable()
export class RecommendationService {
  private readonly logger = new Logger('RecommendationService');

  constructor(
    @InjectRepository(MenuItem)
    private menuItemRepository: Repository<MenuItem>,
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    @InjectRepository(OrderItem)
    private orderItemRepository: Repository<OrderItem>,
    private cacheService: CacheService,
  ) {}

  //* Cached for CACHE_TTL seconds, dropped whenever orders or dishes change
  async getPopularItems(
    limit = DEFAULT_RECOMMENDATION_LIMIT,
  ): Promise<IMenuItem[]> {
    const cacheKey = `${POPULAR_ITEMS_CACHE_PREFIX}:${limit}`;
    const cached = this.cacheService.get<IMenuItem[]>(cacheKey);
    if (cached) return cached;

    const [menuItems, orderItems] = await Promise.all([
      this.menuItemRepository.find({ order: { id: 'ASC' } }),
      this.orderItemRepository.find({
        select: { menuItemId: true, quantity: true },
      }),
    ]);
    const orderedQuantities = orderItems.flatMap(
      ({ menuItemId, quantity }): IOrderedQuantity[] =>
        menuItemId === null ? [] : [{ menuItemId, quantity }],
    );

    const popular = rankPopularItems(menuItems, orderedQuantities, limit).map(
      toMenuItemView,
    );
    this.cacheService.set(cacheKey, popular);
    return popular;
  }

  async getRecommendations(): Promise<IRecommendationsResponse> {
    try {
      const [menuItems, orderCount] = await Promise.all([
        this.menuItemRepository.find({ order: { id: 'ASC' } }),
        this.orderRepository.count(),
      ]);
      return {
        status: HttpStatus.OK,
        message: 'Recommendations fetched successfully',
        recommendations: {
          popular: orderCount > 0 ? await this.getPopularItems() : [],
          highlyRated: rankHighlyRatedItems(menuItems).map(toMenuItemView),
          budgetFriendly:
            rankBudgetFriendlyItems(menuItems).map(toMenuItemView),
        },
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        recommendations: null,
      };
    }
  }
}
