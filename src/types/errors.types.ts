export type RegistryErrorKind = 'NOT_FOUND' | 'CONFLICT' | 'VALIDATION';

/**
 * Business errors raised by the registry. Callers branch on `kind`; any
 * other thrown value is a programming error.
 */
export abstract class RegistryError extends Error {
  abstract readonly kind: RegistryErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Referenced camera or feed does not exist
export class NotFoundError extends RegistryError {
  readonly kind = 'NOT_FOUND';
}

// A uniqueness rule would be broken, or an address bound did not parse
export class ConflictError extends RegistryError {
  readonly kind = 'CONFLICT';
}

export class ValidationError extends RegistryError {
  readonly kind = 'VALIDATION';
}

export const isRegistryError = (error: unknown): error is RegistryError =>
  error instanceof RegistryError;
