export {
  buildCartSummary,
  calculateCartTotal,
  toCartLine,
} from './cart-logic.helper';
