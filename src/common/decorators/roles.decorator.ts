import { SetMetadata } from '@nestjs/common';
import { AccountRole } from '../../database/entities/account.entity';

export const ROLES_KEY = 'roles';

/**
 * Decorator to specify the account roles allowed on a route
 * @param roles - Any one of these roles grants access
 */
export const Roles = (...roles: AccountRole[]) =>
  SetMetadata(ROLES_KEY, roles);
