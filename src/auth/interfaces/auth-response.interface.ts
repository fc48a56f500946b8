import { IResponse } from '../../shared/interfaces';
import { IUser } from './user.interface';

export interface IUserResponse extends IResponse {
  user: IUser | null;
}

export interface ILoginResponse extends IResponse {
  accessToken: string | null;
  user: IUser | null;
}
