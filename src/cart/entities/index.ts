export { CartItem } from './cart-item.entity';
