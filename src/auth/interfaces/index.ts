export { IUser, IAuthUser, IJwtPayload } from './user.interface';
export { IUserResponse, ILoginResponse } from './auth-response.interface';
export { AuthenticatedRequest } from './authenticated-request.interface';
