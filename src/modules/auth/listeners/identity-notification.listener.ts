import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  AccountRegisteredEvent,
  AccountStatusChangedEvent,
  IdentityEvents,
  SingleUseTokenIssuedEvent,
} from '../events/identity.events';

/**
 * Records identity events. A mail transport subscribes to the same events
 * to deliver verification and reset links; token values never reach the log.
 */
@Injectable()
export class IdentityNotificationListener {
  private readonly logger = new Logger(IdentityNotificationListener.name);

  @OnEvent(IdentityEvents.ACCOUNT_REGISTERED)
  handleAccountRegistered(payload: AccountRegisteredEvent): void {
    this.logger.log(
      `Account ${payload.accountId} registered${payload.viaProvider ? ' via external provider' : ''}`,
    );
  }

  @OnEvent(IdentityEvents.VERIFICATION_REQUESTED)
  handleVerificationRequested(payload: SingleUseTokenIssuedEvent): void {
    this.logger.log(
      `Verification email queued for account ${payload.accountId}, expires ${payload.expiresAt.toISOString()}`,
    );
  }

  @OnEvent(IdentityEvents.PASSWORD_RESET_REQUESTED)
  handlePasswordResetRequested(payload: SingleUseTokenIssuedEvent): void {
    this.logger.log(
      `Password reset email queued for account ${payload.accountId}, expires ${payload.expiresAt.toISOString()}`,
    );
  }

  @OnEvent(IdentityEvents.STATUS_CHANGED)
  handleStatusChanged(payload: AccountStatusChangedEvent): void {
    const reason = payload.reason ? ` (${payload.reason})` : '';
    this.logger.log(`Account ${payload.accountId}: ${payload.from} -> ${payload.to}${reason}`);
  }
}
