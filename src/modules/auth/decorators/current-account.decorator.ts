import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import {
  AuthenticatedAccount,
  AuthenticatedRequest,
} from '../interfaces/authenticated-request.interface';

/**
 * Account attached by JwtAuthGuard. Only valid on guarded routes.
 */
export const CurrentAccount = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedAccount => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.account) {
      throw new UnauthorizedException('Authentication required');
    }
    return request.account;
  },
);
