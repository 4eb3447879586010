import { Inject, Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import * as crypto from 'crypto';
import { IDENTITY_OPTIONS, IdentityOptions } from '../config/identity-options';
import { DomainException } from '../exceptions/domain.exception';
import { HashingPool } from './hashing-pool';

const BCRYPT_DIGEST = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;
const BCRYPT_MAX_INPUT_BYTES = 72;

/**
 * Password hashing and verification. Length and strength rules belong to the
 * caller; this service only refuses digests it cannot parse.
 */
@Injectable()
export class CredentialService {
  private readonly logger = new Logger(CredentialService.name);
  private readonly rounds: number;
  private readonly pepper: string | null;

  constructor(
    @Inject(IDENTITY_OPTIONS) options: IdentityOptions,
    private readonly hashingPool: HashingPool,
  ) {
    this.rounds = options.bcryptRounds;
    this.pepper = options.passwordPepper;
  }

  async hash(plaintext: string, signal?: AbortSignal): Promise<string> {
    const input = this.prepare(plaintext);
    if (Buffer.byteLength(input, 'utf8') > BCRYPT_MAX_INPUT_BYTES) {
      throw DomainException.validation(
        `Password must be at most ${BCRYPT_MAX_INPUT_BYTES} bytes long`,
        'password_too_long',
      );
    }
    return this.hashingPool.run(() => bcrypt.hash(input, this.rounds), signal);
  }

  /**
   * bcrypt.compare is constant-time over the digest. A mismatch resolves to
   * false; only an unparseable digest raises.
   */
  async verify(plaintext: string, digest: string, signal?: AbortSignal): Promise<boolean> {
    if (!BCRYPT_DIGEST.test(digest)) {
      this.logger.error('Stored password digest is not a bcrypt digest');
      throw DomainException.credentialCorrupt();
    }
    const input = this.prepare(plaintext);
    // Anything bcrypt would truncate can only match a different password
    if (Buffer.byteLength(input, 'utf8') > BCRYPT_MAX_INPUT_BYTES) {
      return false;
    }
    return this.hashingPool.run(() => bcrypt.compare(input, digest), signal);
  }

  /**
   * With a pepper configured the password is keyed through HMAC-SHA256 first;
   * the base64 output also keeps long passwords under bcrypt's 72-byte limit.
   */
  private prepare(plaintext: string): string {
    if (!this.pepper) {
      return plaintext;
    }
    return crypto.createHmac('sha256', this.pepper).update(plaintext).digest('base64');
  }
}
