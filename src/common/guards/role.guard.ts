import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AccountRole } from '../../database/entities/account.entity';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { AuthenticatedRequest } from '../../modules/auth/interfaces/authenticated-request.interface';

/**
 * Runs after JwtAuthGuard; compares the authenticated account's role with
 * the roles declared through @Roles().
 */
@Injectable()
export class RolesGuard implements CanActivate {
  private readonly logger = new Logger(RolesGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<AccountRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!requiredRoles || requiredRoles.length === 0) {
      return true; // No role requirement
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const account = request.account;

    if (!account) {
      throw new ForbiddenException('Authentication required');
    }

    if (!requiredRoles.includes(account.role)) {
      this.logger.warn(
        `Account ${account.id} with role ${account.role} denied ${request.method} ${request.url}`,
      );
      throw new ForbiddenException('Insufficient permissions for this action');
    }

    return true;
  }
}
