export {
  ICategoriesResponse,
  IMenuItem,
  IMenuItemImageResponse,
  IMenuItemResponse,
  IMenuResponse,
} from './menu-item.interface';
