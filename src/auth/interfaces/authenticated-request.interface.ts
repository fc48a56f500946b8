import { Request } from 'express';
import { IAuthUser } from './user.interface';

export interface AuthenticatedRequest extends Request {
  user?: IAuthUser;
}
