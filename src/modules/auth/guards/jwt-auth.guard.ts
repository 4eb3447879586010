import {
  Injectable,
  CanActivate,
  ExecutionContext,
  Inject,
  UnauthorizedException,
} from '@nestjs/common';
import { AccountStatus } from '../../../database/entities/account.entity';
import { DomainException } from '../exceptions/domain.exception';
import { TokenService } from '../services/token.service';
import { ACCOUNT_STORE, AccountStore } from '../stores/account-store.interface';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { setAccountId } from '../../logging';

const BEARER_PREFIX = 'bearer ';

export function extractBearerToken(header: string | undefined): string | null {
  if (!header || header.length <= BEARER_PREFIX.length) {
    return null;
  }
  if (header.slice(0, BEARER_PREFIX.length).toLowerCase() !== BEARER_PREFIX) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Accepts access tokens only. The account behind the subject must still
 * exist and be ACTIVE, so suspension or deletion takes effect before the
 * token expires.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly tokenService: TokenService,
    @Inject(ACCOUNT_STORE)
    private readonly accountStore: AccountStore,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);

    if (!token) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const claims = this.tokenService.verifySigned(token, 'access');
    const account = await this.accountStore.findById(claims.sub);

    if (!account) {
      throw DomainException.tokenInvalid('subject_unknown');
    }
    if (account.status !== AccountStatus.ACTIVE) {
      throw DomainException.accountInactive(account.status);
    }

    request.account = { id: account.id, email: account.email, role: account.role };
    setAccountId(account.id);
    return true;
  }
}
