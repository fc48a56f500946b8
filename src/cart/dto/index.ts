export { SetCartItemQuantityDto } from './set-cart-item-quantity.dto';
