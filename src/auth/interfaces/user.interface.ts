import { Role } from '../enums';

export interface IUser {
  id: string;
  username: string;
  role: Role;
  createdAt: Date;
}

export interface IAuthUser {
  id: string;
  username: string;
  role: Role;
}

export interface IJwtPayload {
  sub: string;
  username: string;
  role: Role;
}
