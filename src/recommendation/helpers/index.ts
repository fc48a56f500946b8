export {
  BUDGET_PRICE_THRESHOLD,
  DEFAULT_RECOMMENDATION_LIMIT,
  HIGH_RATING_THRESHOLD,
  IOrderedQuantity,
  rankBudgetFriendlyItems,
  rankHighlyRatedItems,
  rankPopularItems,
} from './ranking.helper';
