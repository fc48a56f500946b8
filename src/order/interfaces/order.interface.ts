import { IResponse } from '../../shared/interfaces';
import { CustomerType } from '../enums';

export interface IOrderItem {
  menuItemId: number | null;
  name: string;
  price: number;
  quantity: number;
  subTotal: number;
}

export interface IOrder {
  id: number;
  customerName: string;
  customerType: CustomerType;
  items: IOrderItem[];
  totalAmount: number;
  //? Rendered in APP_TIMEZONE, e.g. 18-10-2026 13:05
  date: string;
  createdAt: Date;
}

export interface IOrderResponse extends IResponse {
  order: IOrder | null;
}

export interface IOrdersResponse extends IResponse {
  orders: IOrder[] | null;
}
