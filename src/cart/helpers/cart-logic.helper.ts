import { roundMoney } from '../../shared/helpers';
import { CartItem } from '../entities';
import { ICart, ICartLine } from '../interfaces';

export const toCartLine = (cartItem: CartItem): ICartLine => {
  const { menuItem, quantity } = cartItem;
  return {
    menuItemId: menuItem.id,
    name: menuItem.name,
    price: menuItem.price,
    quantity,
    subTotal: roundMoney(menuItem.price * quantity),
  };
};

export const calculateCartTotal = (lines: ICartLine[]): number =>
  roundMoney(lines.reduce((total, line) => total + line.subTotal, 0));

export const buildCartSummary = (cartItems: CartItem[]): ICart => {
  const lines = cartItems.map(toCartLine);
  return { lines, total: calculateCartTotal(lines) };
};
