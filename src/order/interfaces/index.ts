export {
  IOrder,
  IOrderItem,
  IOrderResponse,
  IOrdersResponse,
} from './order.interface';
