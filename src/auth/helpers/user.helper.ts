import { User } from '../entities';
import { IUser } from '../interfaces';

export const toPublicUser = (user: User): IUser => ({
  id: user.id,
  username: user.username,
  role: user.role,
  createdAt: user.createdAt,
});

export const extractBearerToken = (
  authorization: string | undefined,
): string | null => {
  if (!authorization) return null;
  const [scheme, token] = authorization.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
};
