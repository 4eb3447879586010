import { Test, TestingModule } from '@nestjs/testing';
import { Reflector } from '@nestjs/core';
import { GUARDS_METADATA } from '@nestjs/common/constants';
import { AccountsAdminController } from './accounts-admin.controller';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/role.guard';
import { ROLES_KEY } from '../../common/decorators/roles.decorator';
import { AccountRole, AccountStatus } from '../../database/entities/account.entity';
import { AuthenticatedAccount } from './interfaces/authenticated-request.interface';
import { BulkAccountAction } from './interfaces/identity.interfaces';

describe('AccountsAdminController', () => {
  let controller: AccountsAdminController;

  const mockAuthService = {
    listAccounts: jest.fn(),
    getStatistics: jest.fn(),
    getAccount: jest.fn(),
    suspend: jest.fn(),
    activate: jest.fn(),
    deactivate: jest.fn(),
    promote: jest.fn(),
    demote: jest.fn(),
    softDelete: jest.fn(),
    hardDelete: jest.fn(),
    createAccountByAdmin: jest.fn(),
    updateAccountByAdmin: jest.fn(),
    bulkAction: jest.fn(),
  };

  const admin: AuthenticatedAccount = {
    id: 'ad000000-0000-4000-8000-000000000001',
    email: 'root@example.com',
    role: AccountRole.ADMIN,
  };
  const targetId = 'c0a80101-0000-4000-8000-000000000002';

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AccountsAdminController],
      providers: [{ provide: AuthService, useValue: mockAuthService }],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue({ canActivate: jest.fn().mockReturnValue(true) })
      .overrideGuard(RolesGuard)
      .useValue({ canActivate: jest.fn().mockReturnValue(true) })
      .compile();

    controller = module.get<AccountsAdminController>(AccountsAdminController);

    jest.clearAllMocks();
  });

  it('should require an authenticated admin on every route', () => {
    const reflector = new Reflector();

    expect(reflector.get(GUARDS_METADATA, AccountsAdminController)).toEqual([
      JwtAuthGuard,
      RolesGuard,
    ]);
    expect(reflector.get(ROLES_KEY, AccountsAdminController)).toEqual([AccountRole.ADMIN]);
  });

  it('should list accounts with the query filters', async () => {
    const page = { items: [], total: 0, skip: 0, limit: 20 };
    mockAuthService.listAccounts.mockResolvedValue(page);

    const result = await controller.listAccounts({
      status: AccountStatus.SUSPENDED,
      skip: 0,
      limit: 20,
    });

    expect(result).toBe(page);
    expect(mockAuthService.listAccounts).toHaveBeenCalledWith({
      status: AccountStatus.SUSPENDED,
      skip: 0,
      limit: 20,
    });
  });

  it('should return statistics', async () => {
    mockAuthService.getStatistics.mockResolvedValue({ totalAccounts: 3 });

    await expect(controller.statistics()).resolves.toEqual({ totalAccounts: 3 });
  });

  it('should suspend with the given reason', async () => {
    mockAuthService.suspend.mockResolvedValue({ id: targetId, status: AccountStatus.SUSPENDED });

    await controller.suspend(targetId, { reason: 'chargeback' }, admin);

    expect(mockAuthService.suspend).toHaveBeenCalledWith(targetId, 'chargeback');
  });

  it('should suspend without a reason', async () => {
    mockAuthService.suspend.mockResolvedValue({ id: targetId, status: AccountStatus.SUSPENDED });

    await controller.suspend(targetId, {}, admin);

    expect(mockAuthService.suspend).toHaveBeenCalledWith(targetId, null);
  });

  it('should forward activate, deactivate and demote', async () => {
    await controller.activate(targetId, admin);
    await controller.deactivate(targetId, admin);
    await controller.demote(targetId, admin);

    expect(mockAuthService.activate).toHaveBeenCalledWith(targetId);
    expect(mockAuthService.deactivate).toHaveBeenCalledWith(targetId);
    expect(mockAuthService.demote).toHaveBeenCalledWith(targetId);
  });

  it('should promote to the requested role', async () => {
    await controller.promote(targetId, { role: AccountRole.MODERATOR }, admin);
    await controller.promote(targetId, {}, admin);

    expect(mockAuthService.promote).toHaveBeenNthCalledWith(1, targetId, AccountRole.MODERATOR);
    expect(mockAuthService.promote).toHaveBeenNthCalledWith(2, targetId, undefined);
  });

  it('should soft delete and hard delete', async () => {
    mockAuthService.hardDelete.mockResolvedValue({ deleted: true });

    await controller.softDelete(targetId, admin);
    await expect(controller.hardDelete(targetId, admin)).resolves.toEqual({ deleted: true });

    expect(mockAuthService.softDelete).toHaveBeenCalledWith(targetId);
    expect(mockAuthService.hardDelete).toHaveBeenCalledWith(targetId);
  });

  it('should split profile fields from the rest of an admin-created account', async () => {
    mockAuthService.createAccountByAdmin.mockResolvedValue({ id: targetId });

    await controller.createAccount(
      {
        email: 'new@example.com',
        username: 'newbie',
        password: 'correct horse',
        role: AccountRole.MODERATOR,
        firstName: 'Grace',
      },
      admin,
    );

    expect(mockAuthService.createAccountByAdmin).toHaveBeenCalledWith({
      email: 'new@example.com',
      username: 'newbie',
      password: 'correct horse',
      profile: { firstName: 'Grace' },
      role: AccountRole.MODERATOR,
      status: undefined,
      emailVerified: undefined,
    });
  });

  it('should forward admin edits for the addressed account', async () => {
    mockAuthService.updateAccountByAdmin.mockResolvedValue({ id: targetId });

    await controller.updateAccount(targetId, { status: AccountStatus.INACTIVE }, admin);

    expect(mockAuthService.updateAccountByAdmin).toHaveBeenCalledWith(targetId, {
      status: AccountStatus.INACTIVE,
    });
  });

  it('should return the per-id outcome of a bulk action', async () => {
    const outcome = {
      action: BulkAccountAction.SUSPEND,
      successCount: 1,
      failedCount: 0,
      succeeded: [targetId],
      failed: [],
    };
    mockAuthService.bulkAction.mockResolvedValue(outcome);

    const result = await controller.bulkAction(
      { accountIds: [targetId], action: BulkAccountAction.SUSPEND, reason: 'spam' },
      admin,
    );

    expect(result).toBe(outcome);
    expect(mockAuthService.bulkAction).toHaveBeenCalledWith({
      accountIds: [targetId],
      action: BulkAccountAction.SUSPEND,
      reason: 'spam',
    });
  });
});
