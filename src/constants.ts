export const ORDER_DATE_FORMAT = 'DD-MM-YYYY HH:mm';
export const DEFAULT_TIMEZONE = 'Asia/Kolkata';

export const POPULAR_ITEMS_CACHE_PREFIX = 'recommendation:popular';

export const MENU_CATEGORIES = [
  'Main Course',
  'Beverage',
  'Side Dish',
  'Dessert',
] as const;
export const ALL_CATEGORIES = 'All';

export const MIN_PASSWORD_LENGTH = 6;
