export {
  calculateOrderTotal,
  createOrderItem,
  createOrderItemFromCart,
  customerTypeLabel,
  describeOrderItems,
  formatOrderDate,
  toOrderView,
} from './order-logic.helper';
