import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, IsNull, QueryFailedError, Repository } from 'typeorm';
import {
  Account,
  AccountRole,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import {
  ConstraintViolationError,
  UniqueConstraint,
} from '../exceptions/constraint-violation.error';
import { DomainException } from '../exceptions/domain.exception';
import { IDENTITY_OPTIONS, IdentityOptions } from '../config/identity-options';
import {
  AccountCounts,
  AccountPage,
  AccountSearchFilter,
  AccountStore,
  FindOptions,
  SingleUsePurpose,
} from './account-store.interface';

const PG_UNIQUE_VIOLATION = '23505';

const CONSTRAINT_BY_INDEX: Record<string, UniqueConstraint> = {
  uq_accounts_email_live: 'email',
  uq_accounts_username_live: 'username',
  uq_accounts_external_identity_live: 'external_identity',
};

/**
 * Maps a Postgres unique violation on one of the live-row indexes to its
 * constraint name; anything else is not a uniqueness failure.
 */
export function toConstraintViolation(error: unknown): ConstraintViolationError | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return null;
  }
  if (!('code' in driverError) || driverError.code !== PG_UNIQUE_VIOLATION) {
    return null;
  }
  const indexName =
    'constraint' in driverError && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : '';
  const constraint = CONSTRAINT_BY_INDEX[indexName];
  return constraint ? new ConstraintViolationError(constraint) : null;
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

@Injectable()
export class TypeOrmAccountStore implements AccountStore {
  private readonly logger = new Logger(TypeOrmAccountStore.name);
  private readonly timeoutMs: number;

  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
    @Inject(IDENTITY_OPTIONS)
    options: IdentityOptions,
  ) {
    this.timeoutMs = options.storeTimeoutMs;
  }

  async save(account: Account): Promise<Account> {
    return this.run('save', () => this.accountRepository.save(account));
  }

  async findById(id: string): Promise<Account | null> {
    return this.run('findById', () => this.accountRepository.findOne({ where: { id } }));
  }

  async findByEmail(email: string, options: FindOptions = {}): Promise<Account | null> {
    return this.run('findByEmail', async () => {
      const live = await this.accountRepository.findOne({
        where: { email, deletedAt: IsNull() },
      });
      if (live || !options.includeDeleted) {
        return live;
      }
      return this.accountRepository.findOne({
        where: { email },
        order: { deletedAt: 'DESC' },
      });
    });
  }

  async findByUsername(username: string): Promise<Account | null> {
    return this.run('findByUsername', () =>
      this.accountRepository.findOne({ where: { username, deletedAt: IsNull() } }),
    );
  }

  async findByExternalIdentity(
    provider: AuthProvider,
    providerId: string,
  ): Promise<Account | null> {
    return this.run('findByExternalIdentity', () =>
      this.accountRepository.findOne({
        where: { authProvider: provider, authProviderId: providerId, deletedAt: IsNull() },
      }),
    );
  }

  async findBySingleUseToken(
    value: string,
    purpose: SingleUsePurpose,
  ): Promise<Account | null> {
    const where: FindOptionsWhere<Account> =
      purpose === 'email_verification'
        ? { emailVerificationToken: value, deletedAt: IsNull() }
        : { passwordResetToken: value, deletedAt: IsNull() };
    return this.run(`findBySingleUseToken:${purpose}`, () =>
      this.accountRepository.findOne({ where }),
    );
  }

  async existsByEmail(email: string, excludeDeleted = true): Promise<boolean> {
    const where: FindOptionsWhere<Account> = excludeDeleted
      ? { email, deletedAt: IsNull() }
      : { email };
    return this.run('existsByEmail', async () => (await this.accountRepository.count({ where })) > 0);
  }

  async existsByUsername(username: string, excludeDeleted = true): Promise<boolean> {
    const where: FindOptionsWhere<Account> = excludeDeleted
      ? { username, deletedAt: IsNull() }
      : { username };
    return this.run(
      'existsByUsername',
      async () => (await this.accountRepository.count({ where })) > 0,
    );
  }

  async search(filter: AccountSearchFilter): Promise<AccountPage> {
    return this.run('search', async () => {
      const query = this.accountRepository.createQueryBuilder('account');

      if (filter.search) {
        query.andWhere(
          '(account.email ILIKE :term OR account.username ILIKE :term OR account.nickname ILIKE :term)',
          { term: `%${escapeLike(filter.search)}%` },
        );
      }
      if (filter.role !== undefined) {
        query.andWhere('account.role = :role', { role: filter.role });
      }
      if (filter.status !== undefined) {
        query.andWhere('account.status = :status', { status: filter.status });
      }
      if (filter.provider !== undefined) {
        query.andWhere('account.authProvider = :provider', { provider: filter.provider });
      }
      if (filter.emailVerified !== undefined) {
        query.andWhere('account.emailVerified = :emailVerified', {
          emailVerified: filter.emailVerified,
        });
      }
      if (filter.isActive !== undefined) {
        query.andWhere('account.isActive = :isActive', { isActive: filter.isActive });
      }

      const [items, total] = await query
        .orderBy('account.createdAt', 'DESC')
        .skip(filter.skip)
        .take(filter.limit)
        .getManyAndCount();

      return { items, total };
    });
  }

  async countByStatus(): Promise<AccountCounts> {
    return this.run('countByStatus', async () => {
      const rows = await this.accountRepository
        .createQueryBuilder('account')
        .select('account.status', 'status')
        .addSelect('COUNT(*)', 'count')
        .groupBy('account.status')
        .getRawMany<{ status: string; count: string }>();

      const counts: AccountCounts = {
        [AccountStatus.PENDING]: 0,
        [AccountStatus.ACTIVE]: 0,
        [AccountStatus.INACTIVE]: 0,
        [AccountStatus.SUSPENDED]: 0,
        [AccountStatus.DELETED]: 0,
        total: 0,
        admins: await this.accountRepository.count({ where: { role: AccountRole.ADMIN } }),
        verified: await this.accountRepository.count({ where: { emailVerified: true } }),
      };

      for (const row of rows) {
        const status = Object.values(AccountStatus).find((value) => value === row.status);
        const count = parseInt(row.count, 10);
        if (status) {
          counts[status] = count;
        }
        counts.total += count;
      }
      return counts;
    });
  }

  async hardDelete(id: string): Promise<boolean> {
    return this.run('hardDelete', async () => {
      const result = await this.accountRepository.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  /**
   * Bounds a store call in time and folds driver failures into typed errors.
   * The timer is cleared when the call settles so no handle outlives it.
   */
  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            DomainException.infrastructure(
              `Account store ${operation} timed out after ${this.timeoutMs}ms`,
              'timeout',
            ),
          ),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([work(), timeout]);
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        throw error;
      }
      if (error instanceof DomainException) {
        this.logger.error(`Account store ${operation} failed: ${error.message}`);
        throw error;
      }
      const violation = toConstraintViolation(error);
      if (violation) {
        throw violation;
      }
      this.logger.error(
        `Account store ${operation} failed`,
        error instanceof Error ? error.stack : String(error),
      );
      throw DomainException.infrastructure(`Account store ${operation} failed`, 'store_unavailable');
    } finally {
      clearTimeout(timer);
    }
  }
}
