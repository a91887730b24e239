export type AuditAction =
  | 'LoginSuccess'
  | 'LoginFailure'
  | 'Logout'
  | 'TokenRefreshed'
  | 'TokenReuseDetected'
  | 'SessionsRevoked'
  | 'PasswordChanged'
  | 'AuthorizationChanged'
  | 'TwoFactorChallengeIssued'
  | 'TwoFactorLoginSuccess'
  | 'TwoFactorLoginFailure'
  | 'TwoFactorRecoveryCodeUsed'
  | 'TwoFactorEnabled'
  | 'TwoFactorDisabled'
  | 'RecoveryCodesRegenerated'
  | 'ExternalLoginSuccess'
  | 'ExternalLoginFailure'
  | 'ExternalAccountCreated'
  | 'ExternalAccountLinked'
  | 'ExternalAccountUnlinked'
  | 'PasswordSet';

/**
 * Audit record handed to the audit sink
 */
export interface AuditEntry {
  action: AuditAction;
  userId?: string;
  targetType?: string;
  targetId?: string;
  metadata?: Record<string, unknown>;
  occurredAt: Date;
}
