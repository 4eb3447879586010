import { JwtService } from '@nestjs/jwt';
import { TokenService } from './token.service';
import { InMemoryAccountStore } from '../stores/in-memory-account.store';
import { createPasswordAccount } from '../lifecycle/account-lifecycle';
import { DomainErrorKind } from '../exceptions/domain.exception';
import {
  TEST_JWT_SECRET,
  identityTestOptions,
} from '../../../../test/fixtures/identity-options';

const ACCOUNT_ID = '9b2f3c1e-4d5a-4b6c-8d7e-0f1a2b3c4d5e';

describe('TokenService', () => {
  let jwtService: JwtService;
  let store: InMemoryAccountStore;
  let service: TokenService;

  beforeEach(() => {
    jwtService = new JwtService({ secret: TEST_JWT_SECRET });
    store = new InMemoryAccountStore();
    service = new TokenService(jwtService, identityTestOptions(), store);
  });

  describe('signed tokens', () => {
    it('should issue an access token that verifies with its claims', () => {
      const token = service.issueAccess(ACCOUNT_ID);

      const claims = service.verifySigned(token, 'access');

      expect(claims.sub).toBe(ACCOUNT_ID);
      expect(claims.type).toBe('access');
      expect(claims.exp - claims.iat).toBe(30 * 60);
      expect(claims.jti).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should give refresh tokens the refresh lifetime', () => {
      const claims = service.verifySigned(service.issueRefresh(ACCOUNT_ID), 'refresh');

      expect(claims.exp - claims.iat).toBe(7 * 24 * 60 * 60);
    });

    it('should give each token a distinct id', () => {
      const first = service.verifySigned(service.issueAccess(ACCOUNT_ID));
      const second = service.verifySigned(service.issueAccess(ACCOUNT_ID));

      expect(first.jti).not.toBe(second.jti);
    });

    it('should reject a refresh token presented as an access token', () => {
      const token = service.issueRefresh(ACCOUNT_ID);

      expect(() => service.verifySigned(token, 'access')).toThrow(
        expect.objectContaining({ kind: DomainErrorKind.TOKEN_INVALID, reason: 'wrong_type' }),
      );
    });

    it('should reject a token signed with another secret', () => {
      const foreign = new JwtService({ secret: 'another-test-secret-with-32-chars' }).sign({
        sub: ACCOUNT_ID,
        type: 'access',
        jti: 'x',
      });

      expect(() => service.verifySigned(foreign)).toThrow(
        expect.objectContaining({
          kind: DomainErrorKind.TOKEN_INVALID,
          reason: 'signature_invalid',
        }),
      );
    });

    it('should reject a token signed with a different algorithm', () => {
      const token = jwtService.sign(
        { sub: ACCOUNT_ID, type: 'access', jti: 'x' },
        { algorithm: 'HS512', expiresIn: 60 },
      );

      expect(() => service.verifySigned(token)).toThrow(
        expect.objectContaining({ kind: DomainErrorKind.TOKEN_INVALID, reason: 'malformed' }),
      );
    });

    it('should reject malformed input', () => {
      expect(() => service.verifySigned('not-a-token')).toThrow(
        expect.objectContaining({ kind: DomainErrorKind.TOKEN_INVALID, reason: 'malformed' }),
      );
    });

    it('should reject a token without the expected claims', () => {
      const token = jwtService.sign({ sub: ACCOUNT_ID }, { expiresIn: 60 });

      expect(() => service.verifySigned(token)).toThrow(
        expect.objectContaining({ kind: DomainErrorKind.TOKEN_INVALID, reason: 'malformed' }),
      );
    });

    it('should report expiry separately from invalidity', () => {
      const token = jwtService.sign({
        sub: ACCOUNT_ID,
        type: 'access',
        jti: 'x',
        exp: Math.floor(Date.now() / 1000) - 60,
      });

      expect(() => service.verifySigned(token)).toThrow(
        expect.objectContaining({ kind: DomainErrorKind.TOKEN_EXPIRED }),
      );
    });
  });

  describe('single-use tokens', () => {
    const saveAccountWithResetToken = async (value: string, expiresAt: Date) => {
      const account = createPasswordAccount(
        { id: ACCOUNT_ID, email: 'ada@example.com', username: 'ada' },
        '$2b$04$digest',
        { token: 'verify-value', expiresAt: new Date(Date.now() + 60_000) },
      );
      account.passwordResetToken = value;
      account.passwordResetExpiresAt = expiresAt;
      return store.save(account);
    };

    it('should issue a 32-byte url-safe value with the purpose lifetime', () => {
      const before = Date.now();

      const token = service.issueSingleUse('password_reset');

      expect(token.value).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(token.expiresAt.getTime()).toBeGreaterThanOrEqual(before + 60 * 60 * 1000);
      expect(token.expiresAt.getTime()).toBeLessThanOrEqual(Date.now() + 60 * 60 * 1000);
    });

    it('should honour an explicit lifetime', () => {
      const before = Date.now();

      const token = service.issueSingleUse('email_verification', 5000);

      expect(token.expiresAt.getTime()).toBeGreaterThanOrEqual(before + 5000);
      expect(token.expiresAt.getTime()).toBeLessThanOrEqual(Date.now() + 5000);
    });

    it('should resolve the account holding a live token', async () => {
      await saveAccountWithResetToken('reset-value', new Date(Date.now() + 60_000));

      const account = await service.consumeSingleUse('reset-value', 'password_reset');

      expect(account.id).toBe(ACCOUNT_ID);
      expect(account.passwordResetToken).toBe('reset-value');
    });

    it('should not match a token presented for the other purpose', async () => {
      await saveAccountWithResetToken('reset-value', new Date(Date.now() + 60_000));

      await expect(
        service.consumeSingleUse('reset-value', 'email_verification'),
      ).rejects.toMatchObject({ kind: DomainErrorKind.TOKEN_INVALID, reason: 'not_found' });
    });

    it('should report an expired token', async () => {
      await saveAccountWithResetToken('reset-value', new Date(Date.now() - 1000));

      await expect(service.consumeSingleUse('reset-value', 'password_reset')).rejects.toMatchObject(
        { kind: DomainErrorKind.TOKEN_EXPIRED },
      );
    });

    it('should reject an empty value without a lookup', async () => {
      const lookup = jest.spyOn(store, 'findBySingleUseToken');

      await expect(service.consumeSingleUse('', 'password_reset')).rejects.toMatchObject({
        kind: DomainErrorKind.TOKEN_INVALID,
        reason: 'malformed',
      });
      expect(lookup).not.toHaveBeenCalled();
    });
  });
});
