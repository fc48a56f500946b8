import { makeMenuItem } from '../../database/factories';
import { CartItem } from '../entities';
import { buildCartSummary, toCartLine } from './cart-logic.helper';

const cartItem = (id: number, name: string, price: number, quantity: number) =>
  Object.assign(new CartItem(), {
    userId: 'user-1',
    menuItemId: id,
    menuItem: makeMenuItem({ id, name, price }),
    quantity,
  });

describe('cart logic helper', () => {
  it('turns a cart item into a priced line', () => {
    expect(toCartLine(cartItem(1, 'Burger', 70.23, 2))).toEqual({
      menuItemId: 1,
      name: 'Burger',
      price: 70.23,
      quantity: 2,
      subTotal: 140.46,
    });
  });

  it('sums line subtotals to two decimals', () => {
    const summary = buildCartSummary([
      cartItem(1, 'Burger', 70.23, 2),
      cartItem(2, 'Coffee', 70.2, 1),
    ]);

    expect(summary.lines.map(({ name }) => name)).toEqual(['Burger', 'Coffee']);
    expect(summary.total).toBe(210.66);
  });

  it('returns a zero total for an empty cart', () => {
    expect(buildCartSummary([])).toEqual({ lines: [], total: 0 });
  });
});
