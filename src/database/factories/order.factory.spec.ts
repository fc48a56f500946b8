import { makeMenuItem } from './menu-item.factory';
import { makeOrder } from './order.factory';

describe('makeOrder', () => {
  const menu = [
    makeMenuItem({ id: 1, name: 'Burger', price: 70.23 }),
    makeMenuItem({ id: 2, name: 'Coffee', price: 70.2 }),
    makeMenuItem({ id: 3, name: 'Pizza', price: 237.26 }),
  ];

  it('builds orders over existing dishes', () => {
    for (let i = 0; i < 20; i++) {
      const order = makeOrder(menu);

      expect(order.orderItems.length).toBeGreaterThanOrEqual(1);
      expect(order.orderItems.length).toBeLessThanOrEqual(3);
      for (const orderItem of order.orderItems) {
        const dish = menu.find(({ id }) => id === orderItem.menuItemId);
        expect(dish?.price).toBe(orderItem.price);
      }
    }
  });

  it('totals its items', () => {
    const order = makeOrder(menu);
    const expected = order.orderItems.reduce(
      (total, { price, quantity }) => total + price * quantity,
      0,
    );

    expect(order.totalAmount).toBeCloseTo(expected, 2);
  });
});
