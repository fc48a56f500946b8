export { Role } from './role.enum';
