export { ICart, ICartLine, ICartResponse } from './cart.interface';
