import { DynamicModule, Module, Provider } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Account } from '../../database/entities/account.entity';
import { AuthController } from './auth.controller';
import { AccountsAdminController } from './accounts-admin.controller';
import { AuthService } from './auth.service';
import { IDENTITY_OPTIONS, IdentityOptions, loadIdentityOptions } from './config/identity-options';
import { HashingPool } from './services/hashing-pool';
import { CredentialService } from './services/credential.service';
import { TokenService } from './services/token.service';
import { ACCOUNT_STORE } from './stores/account-store.interface';
import { InMemoryAccountStore } from './stores/in-memory-account.store';
import { TypeOrmAccountStore } from './stores/typeorm-account.store';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { LoginThrottlerGuard } from './guards/login-throttler.guard';
import { RolesGuard } from '../../common/guards/role.guard';
import { IdentityNotificationListener } from './listeners/identity-notification.listener';

export type AccountStoreDriver = 'typeorm' | 'memory';

/** Maps ACCOUNT_STORE_DRIVER (`postgres`, `typeorm` or `memory`) to a driver; unset means Postgres. */
export function resolveStoreDriver(value: string | undefined): AccountStoreDriver {
  return value === 'memory' ? 'memory' : 'typeorm';
}

export interface AuthModuleOptions {
  storeDriver: AccountStoreDriver;
}

const identityOptionsProvider: Provider = {
  provide: IDENTITY_OPTIONS,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): IdentityOptions =>
    loadIdentityOptions(configService),
};

@Module({})
export class AuthModule {
  /**
   * `memory` keeps accounts in process and needs no database connection;
   * `typeorm` expects TypeOrmModule.forRoot() to be registered by the caller.
   */
  static forRoot(options: AuthModuleOptions): DynamicModule {
    const storeProvider: Provider =
      options.storeDriver === 'memory'
        ? { provide: ACCOUNT_STORE, useClass: InMemoryAccountStore }
        : { provide: ACCOUNT_STORE, useClass: TypeOrmAccountStore };

    return {
      module: AuthModule,
      imports: [
        ConfigModule,
        ...(options.storeDriver === 'typeorm' ? [TypeOrmModule.forFeature([Account])] : []),
        JwtModule.registerAsync({
          imports: [ConfigModule],
          inject: [ConfigService],
          useFactory: (configService: ConfigService) => {
            const identity = loadIdentityOptions(configService);

            if (identity.jwtSecret.length < 32) {
              throw new Error(
                `JWT_SECRET must be at least 32 characters long for security. Current length: ${identity.jwtSecret.length}`,
              );
            }

            return {
              secret: identity.jwtSecret,
              signOptions: { algorithm: identity.jwtAlgorithm },
              verifyOptions: { algorithms: [identity.jwtAlgorithm] },
            };
          },
        }),
      ],
      controllers: [AuthController, AccountsAdminController],
      providers: [
        identityOptionsProvider,
        storeProvider,
        HashingPool,
        CredentialService,
        TokenService,
        AuthService,
        JwtAuthGuard,
        RolesGuard,
        LoginThrottlerGuard,
        IdentityNotificationListener,
      ],
      exports: [AuthService, TokenService, JwtAuthGuard, ACCOUNT_STORE],
    };
  }
}
