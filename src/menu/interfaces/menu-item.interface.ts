import { IResponse } from '../../shared/interfaces';

export interface IMenuItem {
  id: number;
  name: string;
  price: number;
  rating: number;
  category: string;
  tags: string[];
  imageUrl: string | null;
}

export interface IMenuResponse extends IResponse {
  category: string;
  items: IMenuItem[];
  page: number;
  totalPages: number;
  totalItems: number;
}

export interface IMenuItemResponse extends IResponse {
  item: IMenuItem | null;
}

export interface ICategoriesResponse extends IResponse {
  categories: string[];
}

export interface IMenuItemImageResponse extends IResponse {
  image: Buffer | null;
}
