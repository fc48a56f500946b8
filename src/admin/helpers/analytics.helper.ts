import * as _ from 'lodash';
import { Order, OrderItem } from '../../order/entities';
import { CustomerType } from '../../order/enums';
import { roundMoney } from '../../shared/helpers';
import {
  ICustomerDistribution,
  IDashboardStats,
  IPopularItem,
} from '../interfaces';

export const TOP_ITEMS_LIMIT = 5;

export const buildDashboardStats = (
  totalOrders: number,
  revenue: number,
  menuItems: number,
): IDashboardStats => ({
  totalOrders,
  revenue: roundMoney(revenue),
  menuItems,
  averageOrder: totalOrders > 0 ? roundMoney(revenue / totalOrders) : 0,
});

//* Grouped by dish name so renamed or deleted dishes still count
export const summarizePopularItems = (
  orderItems: Pick<OrderItem, 'name' | 'quantity'>[],
  limit = TOP_ITEMS_LIMIT,
): IPopularItem[] =>
  _.orderBy(
    Object.entries(_.groupBy(orderItems, 'name')).map(([name, rows]) => ({
      name,
      quantity: _.sumBy(rows, 'quantity'),
    })),
    ['quantity', 'name'],
    ['desc', 'asc'],
  ).slice(0, limit);

export const countCustomerTypes = (
  orders: Pick<Order, 'customerType'>[],
): ICustomerDistribution => {
  const teachers = orders.filter(
    ({ customerType }) => customerType === CustomerType.TEACHER,
  ).length;
  return { teachers, students: orders.length - teachers };
};
