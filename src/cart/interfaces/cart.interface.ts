import { IResponse } from '../../shared/interfaces';

export interface ICartLine {
  menuItemId: number;
  name: string;
  price: number;
  quantity: number;
  subTotal: number;
}

export interface ICart {
  lines: ICartLine[];
  total: number;
}

export interface ICartResponse extends IResponse {
  cart: ICart | null;
}
