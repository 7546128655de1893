export type CooldownErrorCode = 'store_init_failed' | 'config_invalid' | 'flush_failed' | 'engine_stopped';

export class CooldownError extends Error {
  constructor(public readonly code: CooldownErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'CooldownError';
  }
}

export type AuthErrorCode = 'invalid_request' | 'invalid_token' | 'expired_token' | 'forbidden';

export class AuthError extends Error {
  constructor(public readonly code: AuthErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'AuthError';
  }
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
