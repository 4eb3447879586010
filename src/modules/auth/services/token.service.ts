import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService, TokenExpiredError, JsonWebTokenError } from '@nestjs/jwt';
import * as crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Account } from '../../../database/entities/account.entity';
import { IDENTITY_OPTIONS, IdentityOptions } from '../config/identity-options';
import { DomainException } from '../exceptions/domain.exception';
import {
  ACCOUNT_STORE,
  AccountStore,
  SingleUsePurpose,
} from '../stores/account-store.interface';

export type SignedTokenType = 'access' | 'refresh';

export interface SignedTokenClaims {
  sub: string;
  type: SignedTokenType;
  jti: string;
  iat: number;
  exp: number;
}

export interface SingleUseToken {
  value: string;
  expiresAt: Date;
}

const SINGLE_USE_BYTES = 32;

function isSignedTokenType(value: unknown): value is SignedTokenType {
  return value === 'access' || value === 'refresh';
}

/**
 * Issues and checks two kinds of token:
 * - signed bearer tokens (access/refresh), verified without a store lookup;
 * - single-use opaque values persisted on the account, consumed through the
 *   AccountStore. Clearing a consumed value is the caller's job and must
 *   happen in the same save as the mutation it authorises.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(IDENTITY_OPTIONS)
    private readonly options: IdentityOptions,
    @Inject(ACCOUNT_STORE)
    private readonly accountStore: AccountStore,
  ) {}

  get accessTtlSeconds(): number {
    return this.options.accessTokenTtlMinutes * 60;
  }

  get refreshTtlSeconds(): number {
    return this.options.refreshTokenTtlDays * 24 * 60 * 60;
  }

  issueAccess(subjectId: string): string {
    return this.sign(subjectId, 'access', this.accessTtlSeconds);
  }

  issueRefresh(subjectId: string): string {
    return this.sign(subjectId, 'refresh', this.refreshTtlSeconds);
  }

  /**
   * Stateless verification. Expiry maps to TOKEN_EXPIRED; a bad signature,
   * malformed input, missing claims or the wrong token type map to
   * TOKEN_INVALID with the matching reason.
   */
  verifySigned(token: string, expectedType?: SignedTokenType): SignedTokenClaims {
    let payload: Record<string, unknown>;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        algorithms: [this.options.jwtAlgorithm],
      });
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw DomainException.tokenExpired();
      }
      if (error instanceof JsonWebTokenError) {
        const reason =
          error.message === 'invalid signature' ? 'signature_invalid' : 'malformed';
        this.logger.warn(`Rejected signed token: ${reason}`);
        throw DomainException.tokenInvalid(reason);
      }
      throw error;
    }

    const { sub, type, jti, iat, exp } = payload;
    if (
      typeof sub !== 'string' ||
      !isSignedTokenType(type) ||
      typeof jti !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number'
    ) {
      throw DomainException.tokenInvalid('malformed');
    }
    if (expectedType && type !== expectedType) {
      throw DomainException.tokenInvalid('wrong_type');
    }

    return { sub, type, jti, iat, exp };
  }

  issueSingleUse(
    purpose: SingleUsePurpose,
    ttlMs: number = this.defaultSingleUseTtlMs(purpose),
  ): SingleUseToken {
    return {
      value: crypto.randomBytes(SINGLE_USE_BYTES).toString('base64url'),
      expiresAt: new Date(Date.now() + ttlMs),
    };
  }

  /**
   * Resolves the account holding `value` for `purpose`. Does not clear it.
   */
  async consumeSingleUse(value: string, purpose: SingleUsePurpose): Promise<Account> {
    if (!value) {
      throw DomainException.tokenInvalid('malformed');
    }

    const account = await this.accountStore.findBySingleUseToken(value, purpose);
    if (!account) {
      throw DomainException.tokenInvalid('not_found');
    }

    const expiresAt =
      purpose === 'email_verification'
        ? account.emailVerificationExpiresAt
        : account.passwordResetExpiresAt;
    if (!expiresAt || expiresAt.getTime() <= Date.now()) {
      this.logger.warn(`Expired ${purpose} token presented for account ${account.id}`);
      throw DomainException.tokenExpired();
    }

    return account;
  }

  private defaultSingleUseTtlMs(purpose: SingleUsePurpose): number {
    return purpose === 'email_verification'
      ? this.options.emailVerificationTtlHours * 60 * 60 * 1000
      : this.options.passwordResetTtlMinutes * 60 * 1000;
  }

  private sign(subjectId: string, type: SignedTokenType, ttlSeconds: number): string {
    return this.jwtService.sign(
      { sub: subjectId, type, jti: uuidv4() },
      { expiresIn: ttlSeconds, algorithm: this.options.jwtAlgorithm },
    );
  }
}
