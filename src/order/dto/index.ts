export { PlaceOrderDto } from './place-order.dto';
export { ListOrdersDto } from './list-orders.dto';
