import {
  ExecutionContext,
  UnauthorizedException,
  createParamDecorator,
} from '@nestjs/common';
import { AuthenticatedRequest, IAuthUser } from '../interfaces';

export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): IAuthUser => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException('Please log in');
    }
    return request.user;
  },
);
