// Asset Registry - Errors

export type RegistryErrorCode =
  | 'ZeroAddress'
  | 'NotFound'
  | 'InvalidAccount'
  | 'SelfApproval'
  | 'Unauthorized'
  | 'OwnerMismatch'
  | 'AlreadyMinted'
  | 'InvalidTokenId'
  | 'InvalidSnapshot';

/**
 * Rejection of a single registry operation. State is untouched when thrown.
 */
export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: RegistryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    if (details) {
      this.details = details;
    }
  }
}

export function isRegistryError(value: unknown): value is RegistryError {
  return value instanceof RegistryError;
}
