import { faker } from '@faker-js/faker';
import { MENU_CATEGORIES } from '../../constants';
import { MenuItem } from '../../menu/entities';
import { roundMoney } from '../../shared/helpers';

const TAGS = ['popular', 'vegetarian', 'non-veg', 'hot', 'sweet', 'healthy'];

export const makeMenuItem = (overrides: Partial<MenuItem> = {}): MenuItem => {
  const menuItem = new MenuItem();
  menuItem.name = faker.commerce.productName();
  menuItem.price = roundMoney(faker.number.float({ min: 20, max: 300 }));
  menuItem.rating =
    Math.round(faker.number.float({ min: 3, max: 5 }) * 10) / 10;
  menuItem.category = faker.helpers.arrayElement(MENU_CATEGORIES);
  menuItem.tags = faker.helpers.arrayElements(TAGS, { min: 1, max: 2 });
  menuItem.imageFile = null;
  return Object.assign(menuItem, overrides);
};
