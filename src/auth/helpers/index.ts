export { hashPassword, verifyPassword } from './password.helper';
export { toPublicUser, extractBearerToken } from './user.helper';
