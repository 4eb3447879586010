import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { AdminCreateAccountDto, BulkActionDto, MAX_BULK_ACCOUNTS } from './account-admin.dto';
import { BulkAccountAction } from '../interfaces/identity.interfaces';

const ACCOUNT_ID = 'c0a80101-0000-4000-8000-000000000002';

describe('BulkActionDto', () => {
  const propertiesInError = async (plain: Record<string, unknown>) =>
    (await validate(plainToInstance(BulkActionDto, plain))).map((e) => e.property);

  it('should accept a list of account ids and a known action', async () => {
    await expect(
      propertiesInError({ accountIds: [ACCOUNT_ID], action: 'suspend', reason: 'spam' }),
    ).resolves.toEqual([]);
  });

  it('should reject an empty or oversized list', async () => {
    await expect(propertiesInError({ accountIds: [], action: 'activate' })).resolves.toEqual([
      'accountIds',
    ]);

    const tooMany = Array.from({ length: MAX_BULK_ACCOUNTS + 1 }, () => ACCOUNT_ID);
    await expect(
      propertiesInError({ accountIds: tooMany, action: BulkAccountAction.ACTIVATE }),
    ).resolves.toEqual(['accountIds']);
  });

  it('should reject ids that are not UUIDs and unknown actions', async () => {
    await expect(
      propertiesInError({ accountIds: [ACCOUNT_ID, 'not-a-uuid'], action: 'archive' }),
    ).resolves.toEqual(['accountIds', 'action']);
  });
});

describe('AdminCreateAccountDto', () => {
  const base = { email: 'grace@example.com', username: 'grace', password: 'correct horse' };

  it('should only accept statuses an administrator may set', async () => {
    const suspended = plainToInstance(AdminCreateAccountDto, { ...base, status: 'suspended' });
    const pending = plainToInstance(AdminCreateAccountDto, { ...base, status: 'pending' });

    expect(await validate(suspended)).toHaveLength(0);
    const errors = await validate(pending);
    expect(errors.map((e) => e.property)).toEqual(['status']);
  });

  it('should reject a password over 72 bytes', async () => {
    const dto = plainToInstance(AdminCreateAccountDto, { ...base, password: 'é'.repeat(37) });

    const errors = await validate(dto);
    expect(errors.map((e) => e.property)).toEqual(['password']);
  });
});
