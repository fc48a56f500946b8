import { makeMenuItem } from '../../database/factories';
import { Order } from '../entities';
import { CustomerType } from '../enums';
import {
  calculateOrderTotal,
  createOrderItem,
  customerTypeLabel,
  describeOrderItems,
  formatOrderDate,
  toOrderView,
} from './order-logic.helper';

describe('order logic helper', () => {
  const burger = makeMenuItem({ id: 1, name: 'Burger', price: 70.23 });
  const coffee = makeMenuItem({ id: 2, name: 'Coffee', price: 70.2 });

  it('snapshots the dish name and price', () => {
    const orderItem = createOrderItem(burger, 2);

    expect(orderItem).toMatchObject({
      menuItemId: 1,
      name: 'Burger',
      price: 70.23,
      quantity: 2,
      subTotal: 140.46,
    });
  });

  it('totals price times quantity', () => {
    expect(
      calculateOrderTotal([createOrderItem(burger, 2), createOrderItem(coffee, 1)]),
    ).toBe(210.66);
  });

  it('renders dates in the configured timezone', () => {
    const date = new Date('2024-01-15T10:30:00Z');

    expect(formatOrderDate(date, 'Asia/Kolkata')).toBe('15-01-2024 16:00');
    expect(formatOrderDate(date, 'UTC')).toBe('15-01-2024 10:30');
  });

  it('labels customer types', () => {
    expect(customerTypeLabel(CustomerType.TEACHER)).toBe('Teacher');
    expect(customerTypeLabel(CustomerType.STUDENT)).toBe('Student');
  });

  it('describes items with their quantities', () => {
    const items = [createOrderItem(burger, 2), createOrderItem(coffee, 1)];

    expect(describeOrderItems(items, '; ')).toBe('Burger x2; Coffee x1');
    expect(describeOrderItems(items, ', ')).toBe('Burger x2, Coffee x1');
  });

  it('builds the order view', () => {
    const order = Object.assign(new Order(), {
      id: 7,
      userId: 'user-1',
      customerName: 'Asha',
      customerType: CustomerType.STUDENT,
      totalAmount: 70.23,
      createdAt: new Date('2024-01-15T10:30:00Z'),
      orderItems: [createOrderItem(burger, 1)],
    });

    expect(toOrderView(order, 'UTC')).toEqual({
      id: 7,
      customerName: 'Asha',
      customerType: CustomerType.STUDENT,
      items: [
        {
          menuItemId: 1,
          name: 'Burger',
          price: 70.23,
          quantity: 1,
          subTotal: 70.23,
        },
      ],
      totalAmount: 70.23,
      date: '15-01-2024 10:30',
      createdAt: new Date('2024-01-15T10:30:00Z'),
    });
  });
});
