import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { config as loadEnvFile } from 'dotenv';
import { AppController } from './app.controller';
import { AuthModule, resolveStoreDriver } from './modules/auth/auth.module';
import { LoggingModule } from './modules/logging/logging.module';
import { Account } from './database/entities/account.entity';
import { CorrelationIdMiddleware } from './modules/logging/middleware/correlation-id.middleware';

// The store choice is made at import, before ConfigModule.forRoot reads .env
loadEnvFile();
const storeDriver = resolveStoreDriver(process.env.ACCOUNT_STORE_DRIVER);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    EventEmitterModule.forRoot(),
    ThrottlerModule.forRoot([
      {
        ttl: 900000, // 15 minutes
        limit: 100,
      },
    ]),
    ...(storeDriver === 'typeorm'
      ? [
          TypeOrmModule.forRoot({
            type: 'postgres',
            host: process.env.DATABASE_HOST || 'localhost',
            port: parseInt(process.env.DATABASE_PORT || '5432', 10),
            username: process.env.DATABASE_USER || 'identity',
            password: process.env.DATABASE_PASSWORD || 'identity_password',
            database: process.env.DATABASE_NAME || 'identity_db',
            entities: [Account],
            synchronize: false, // Always false - use migrations
            logging: process.env.NODE_ENV === 'development',
            poolSize: parseInt(process.env.DATABASE_POOL_SIZE || '20', 10),
          }),
        ]
      : []),
    LoggingModule,
    AuthModule.forRoot({ storeDriver }),
  ],
  controllers: [AppController],
  providers: [
    // Disable global throttler in test environment
    ...(process.env.NODE_ENV !== 'test'
      ? [
          {
            provide: APP_GUARD,
            useClass: ThrottlerGuard,
          },
        ]
      : []),
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
