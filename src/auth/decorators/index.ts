export { Roles, ROLES_KEY } from './roles.decorator';
export { CurrentUser } from './current-user.decorator';
