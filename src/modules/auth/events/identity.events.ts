export const IdentityEvents = {
  ACCOUNT_REGISTERED: 'identity.account_registered',
  VERIFICATION_REQUESTED: 'identity.verification_requested',
  PASSWORD_RESET_REQUESTED: 'identity.password_reset_requested',
  STATUS_CHANGED: 'identity.status_changed',
} as const;

export interface AccountRegisteredEvent {
  accountId: string;
  email: string;
  viaProvider: boolean;
}

/**
 * Carries the single-use value so a mail transport can deliver it. Listeners
 * must not log `token`.
 */
export interface SingleUseTokenIssuedEvent {
  accountId: string;
  email: string;
  token: string;
  expiresAt: Date;
}

export interface AccountStatusChangedEvent {
  accountId: string;
  from: string;
  to: string;
  reason?: string | null;
}
