import { faker } from '@faker-js/faker';
import { MenuItem } from '../../menu/entities';
import { Order } from '../../order/entities';
import { CustomerType } from '../../order/enums';
import { calculateOrderTotal, createOrderItem } from '../../order/helpers';

const MAX_LINES = 3;
const MAX_QUANTITY = 4;

//* Builds an unsaved order over dishes picked from `menuItems`
export const makeOrder = (menuItems: MenuItem[]): Order => {
  const order = new Order();
  order.userId = null;
  order.customerName = faker.person.fullName();
  order.customerType = faker.helpers.arrayElement(Object.values(CustomerType));
  order.orderItems = faker.helpers
    .arrayElements(menuItems, { min: 1, max: MAX_LINES })
    .map((menuItem) =>
      createOrderItem(menuItem, faker.number.int({ min: 1, max: MAX_QUANTITY })),
    );
  order.totalAmount = calculateOrderTotal(order.orderItems);
  order.createdAt = faker.date.recent({ days: 30 });
  return order;
};
