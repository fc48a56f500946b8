export { MenuItem } from './menu-item.entity';
