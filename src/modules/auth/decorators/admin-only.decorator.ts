import { applyDecorators, UseGuards } from '@nestjs/common';
import { AccountRole } from '../../../database/entities/account.entity';
import { Roles } from '../../../common/decorators/roles.decorator';
import { RolesGuard } from '../../../common/guards/role.guard';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';

export function AdminOnly() {
  return applyDecorators(UseGuards(JwtAuthGuard, RolesGuard), Roles(AccountRole.ADMIN));
}
