export { GetMenuDto } from './get-menu.dto';
export { CreateMenuItemDto } from './create-menu-item.dto';
