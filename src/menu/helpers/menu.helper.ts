import { MenuItem } from '../entities';
import { IMenuItem } from '../interfaces';

export const toMenuItemView = (menuItem: MenuItem): IMenuItem => ({
  id: menuItem.id,
  name: menuItem.name,
  price: menuItem.price,
  rating: menuItem.rating,
  category: menuItem.category,
  tags: menuItem.tags,
  imageUrl: menuItem.imageFile ? `/menu/${menuItem.id}/image` : null,
});

export const calculateTotalPages = (totalItems: number, pageSize: number) =>
  Math.max(1, Math.ceil(totalItems / pageSize));
