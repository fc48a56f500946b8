import * as _ from 'lodash';
import { MenuItem } from '../../menu/entities';

export interface IOrderedQuantity {
  menuItemId: number;
  quantity: number;
}

export const DEFAULT_RECOMMENDATION_LIMIT = 3;
export const HIGH_RATING_THRESHOLD = 4.3;
export const BUDGET_PRICE_THRESHOLD = 100;

/**
 * Most ordered dishes first. Dishes removed from the menu are skipped, and when
 * nothing has been ordered yet the first dishes of the menu stand in.
 */
export const rankPopularItems = (
  menuItems: MenuItem[],
  orderedQuantities: IOrderedQuantity[],
  limit = DEFAULT_RECOMMENDATION_LIMIT,
): MenuItem[] => {
  if (orderedQuantities.length === 0) {
    return _.sortBy(menuItems, 'id').slice(0, limit);
  }

  const totals = Object.entries(
    _.groupBy(orderedQuantities, 'menuItemId'),
  ).map(([menuItemId, rows]) => ({
    menuItemId: Number(menuItemId),
    quantity: _.sumBy(rows, 'quantity'),
  }));
  const menuItemsById = _.keyBy(menuItems, 'id');

  return _.orderBy(totals, ['quantity', 'menuItemId'], ['desc', 'asc'])
    .filter(({ menuItemId }) => menuItemId in menuItemsById)
    .slice(0, limit)
    .map(({ menuItemId }) => menuItemsById[menuItemId]);
};

export const rankHighlyRatedItems = (
  menuItems: MenuItem[],
  minRating = HIGH_RATING_THRESHOLD,
  limit = DEFAULT_RECOMMENDATION_LIMIT,
): MenuItem[] =>
  _.orderBy(
    menuItems.filter(({ rating }) => rating >= minRating),
    ['rating', 'id'],
    ['desc', 'asc'],
  ).slice(0, limit);

export const rankBudgetFriendlyItems = (
  menuItems: MenuItem[],
  maxPrice = BUDGET_PRICE_THRESHOLD,
  limit = DEFAULT_RECOMMENDATION_LIMIT,
): MenuItem[] =>
  _.orderBy(
    menuItems.filter(({ price }) => price <= maxPrice),
    ['price', 'id'],
    ['asc', 'asc'],
  ).slice(0, limit);
