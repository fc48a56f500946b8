import moment from 'moment-timezone';
import { CartItem } from '../../cart/entities';
import { ORDER_DATE_FORMAT } from '../../constants';
import { MenuItem } from '../../menu/entities';
import { roundMoney } from '../../shared/helpers';
import { Order, OrderItem } from '../entities';
import { CustomerType } from '../enums';
import { IOrder, IOrderItem } from '../interfaces';

export const createOrderItem = (
  menuItem: MenuItem,
  quantity: number,
): OrderItem => {
  const orderItem = new OrderItem();
  orderItem.menuItemId = menuItem.id;
  orderItem.name = menuItem.name;
  orderItem.price = menuItem.price;
  orderItem.quantity = quantity;
  orderItem.subTotal = roundMoney(menuItem.price * quantity);
  return orderItem;
};

export const createOrderItemFromCart = ({
  menuItem,
  quantity,
}: CartItem): OrderItem => createOrderItem(menuItem, quantity);

export const calculateOrderTotal = (
  orderItems: Pick<OrderItem, 'price' | 'quantity'>[],
): number =>
  roundMoney(
    orderItems.reduce(
      (currentTotal, { price, quantity }) => currentTotal + price * quantity,
      0,
    ),
  );

export const formatOrderDate = (date: Date, timezone: string): string =>
  moment(date).tz(timezone).format(ORDER_DATE_FORMAT);

export const customerTypeLabel = (customerType: CustomerType): string =>
  customerType === CustomerType.TEACHER ? 'Teacher' : 'Student';

export const describeOrderItems = (
  items: Pick<IOrderItem, 'name' | 'quantity'>[],
  separator: string,
): string =>
  items.map(({ name, quantity }) => `${name} x${quantity}`).join(separator);

export const toOrderView = (order: Order, timezone: string): IOrder => ({
  id: order.id,
  customerName: order.customerName,
  customerType: order.customerType,
  items: (order.orderItems ?? []).map((orderItem) => ({
    menuItemId: orderItem.menuItemId,
    name: orderItem.name,
    price: orderItem.price,
    quantity: orderItem.quantity,
    subTotal: orderItem.subTotal,
  })),
  totalAmount: order.totalAmount,
  date: formatOrderDate(order.createdAt, timezone),
  createdAt: order.createdAt,
});
