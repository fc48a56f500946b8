export { Order } from './order.entity';
export { OrderItem } from './order-item.entity';
