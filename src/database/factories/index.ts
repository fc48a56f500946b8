export { makeMenuItem } from './menu-item.factory';
export { makeOrder } from './order.factory';
