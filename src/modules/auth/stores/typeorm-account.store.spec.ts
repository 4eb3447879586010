import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import {
  Account,
  AccountStatus,
  AuthProvider,
} from '../../../database/entities/account.entity';
import { IDENTITY_OPTIONS } from '../config/identity-options';
import { ConstraintViolationError } from '../exceptions/constraint-violation.error';
import { DomainErrorKind } from '../exceptions/domain.exception';
import { TypeOrmAccountStore, toConstraintViolation } from './typeorm-account.store';
import { identityTestOptions } from '../../../../test/fixtures/identity-options';

const uniqueViolation = (constraint: string) =>
  new QueryFailedError(
    'INSERT INTO "accounts"',
    [],
    Object.assign(new Error('duplicate key value violates unique constraint'), {
      code: '23505',
      constraint,
    }),
  );

describe('TypeOrmAccountStore', () => {
  let store: TypeOrmAccountStore;

  const queryBuilder = {
    andWhere: jest.fn().mockReturnThis(),
    orderBy: jest.fn().mockReturnThis(),
    skip: jest.fn().mockReturnThis(),
    take: jest.fn().mockReturnThis(),
    select: jest.fn().mockReturnThis(),
    addSelect: jest.fn().mockReturnThis(),
    groupBy: jest.fn().mockReturnThis(),
    getManyAndCount: jest.fn(),
    getRawMany: jest.fn(),
  };

  const mockAccountRepository = {
    save: jest.fn(),
    findOne: jest.fn(),
    count: jest.fn(),
    delete: jest.fn(),
    createQueryBuilder: jest.fn(() => queryBuilder),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmAccountStore,
        { provide: getRepositoryToken(Account), useValue: mockAccountRepository },
        { provide: IDENTITY_OPTIONS, useValue: identityTestOptions({ storeTimeoutMs: 50 }) },
      ],
    }).compile();

    store = module.get<TypeOrmAccountStore>(TypeOrmAccountStore);
  });

  describe('toConstraintViolation', () => {
    it('should map the live-row indexes to constraint names', () => {
      expect(toConstraintViolation(uniqueViolation('uq_accounts_email_live'))?.constraint).toBe(
        'email',
      );
      expect(
        toConstraintViolation(uniqueViolation('uq_accounts_username_live'))?.constraint,
      ).toBe('username');
      expect(
        toConstraintViolation(uniqueViolation('uq_accounts_external_identity_live'))?.constraint,
      ).toBe('external_identity');
    });

    it('should ignore other indexes and other errors', () => {
      expect(toConstraintViolation(uniqueViolation('accounts_pkey'))).toBeNull();
      expect(toConstraintViolation(new Error('connection reset'))).toBeNull();
    });
  });

  describe('save', () => {
    it('should surface a unique violation as ConstraintViolationError', async () => {
      mockAccountRepository.save.mockRejectedValue(uniqueViolation('uq_accounts_email_live'));

      const error = await store.save(new Account()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConstraintViolationError);
      expect(error).toMatchObject({ constraint: 'email' });
    });

    it('should fold driver failures into a retryable infrastructure error', async () => {
      mockAccountRepository.save.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(store.save(new Account())).rejects.toMatchObject({
        kind: DomainErrorKind.INFRASTRUCTURE,
        reason: 'store_unavailable',
        retryable: true,
      });
    });
  });

  it('should time out a call that does not settle', async () => {
    mockAccountRepository.findOne.mockReturnValue(new Promise(() => undefined));

    await expect(store.findById('a1')).rejects.toMatchObject({
      kind: DomainErrorKind.INFRASTRUCTURE,
      reason: 'timeout',
    });
  });

  describe('lookups', () => {
    it('should only look at live rows by email', async () => {
      mockAccountRepository.findOne.mockResolvedValue(null);

      expect(await store.findByEmail('ada@example.com')).toBeNull();
      expect(mockAccountRepository.findOne).toHaveBeenCalledTimes(1);
      expect(mockAccountRepository.findOne).toHaveBeenCalledWith({
        where: { email: 'ada@example.com', deletedAt: expect.anything() },
      });
    });

    it('should fall back to the latest deleted row when asked', async () => {
      const deleted = Object.assign(new Account(), { id: 'a1', status: AccountStatus.DELETED });
      mockAccountRepository.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce(deleted);

      const found = await store.findByEmail('ada@example.com', { includeDeleted: true });

      expect(found).toBe(deleted);
      expect(mockAccountRepository.findOne).toHaveBeenLastCalledWith({
        where: { email: 'ada@example.com' },
        order: { deletedAt: 'DESC' },
      });
    });

    it('should query the external identity pair', async () => {
      mockAccountRepository.findOne.mockResolvedValue(null);

      await store.findByExternalIdentity(AuthProvider.NAVER, 'n-7');

      expect(mockAccountRepository.findOne).toHaveBeenCalledWith({
        where: {
          authProvider: AuthProvider.NAVER,
          authProviderId: 'n-7',
          deletedAt: expect.anything(),
        },
      });
    });

    it('should query the token column for the purpose', async () => {
      mockAccountRepository.findOne.mockResolvedValue(null);

      await store.findBySingleUseToken('reset-value', 'password_reset');

      expect(mockAccountRepository.findOne).toHaveBeenCalledWith({
        where: { passwordResetToken: 'reset-value', deletedAt: expect.anything() },
      });
    });

    it('should count for existence checks', async () => {
      mockAccountRepository.count.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      expect(await store.existsByEmail('ada@example.com')).toBe(true);
      expect(await store.existsByUsername('ada', false)).toBe(false);
      expect(mockAccountRepository.count).toHaveBeenLastCalledWith({ where: { username: 'ada' } });
    });
  });

  describe('search', () => {
    it('should apply filters, escape the term and page', async () => {
      queryBuilder.getManyAndCount.mockResolvedValue([[], 0]);

      const page = await store.search({
        search: '50%_off',
        status: AccountStatus.ACTIVE,
        skip: 20,
        limit: 10,
      });

      expect(page).toEqual({ items: [], total: 0 });
      expect(queryBuilder.andWhere).toHaveBeenCalledWith(
        '(account.email ILIKE :term OR account.username ILIKE :term OR account.nickname ILIKE :term)',
        { term: '%50\\%\\_off%' },
      );
      expect(queryBuilder.andWhere).toHaveBeenCalledWith('account.status = :status', {
        status: AccountStatus.ACTIVE,
      });
      expect(queryBuilder.andWhere).toHaveBeenCalledTimes(2);
      expect(queryBuilder.skip).toHaveBeenCalledWith(20);
      expect(queryBuilder.take).toHaveBeenCalledWith(10);
    });
  });

  it('should build status counts from grouped rows', async () => {
    queryBuilder.getRawMany.mockResolvedValue([
      { status: 'active', count: '5' },
      { status: 'pending', count: '2' },
    ]);
    mockAccountRepository.count.mockResolvedValueOnce(1).mockResolvedValueOnce(4);

    const counts = await store.countByStatus();

    expect(counts).toEqual({
      pending: 2,
      active: 5,
      inactive: 0,
      suspended: 0,
      deleted: 0,
      total: 7,
      admins: 1,
      verified: 4,
    });
  });

  it('should report whether a hard delete removed a row', async () => {
    mockAccountRepository.delete.mockResolvedValueOnce({ affected: 1 });
    mockAccountRepository.delete.mockResolvedValueOnce({ affected: 0 });

    expect(await store.hardDelete('a1')).toBe(true);
    expect(await store.hardDelete('a1')).toBe(false);
  });
});
