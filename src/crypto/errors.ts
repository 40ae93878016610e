/**
 * Security exceptions raised by engines and key factories.
 *
 * The split matters to callers: only an InvalidKeyError may trigger the
 * private key re-encoding fallback, a NoSuchAlgorithmError never does.
 */

export class GeneralSecurityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'GeneralSecurityError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** No engine or key factory exists for the requested algorithm name */
export class NoSuchAlgorithmError extends GeneralSecurityError {
  constructor(public readonly algorithm: string) {
    super(`${algorithm} is not supported`);
    this.name = 'NoSuchAlgorithmError';
  }
}

/** The key object cannot be used by the engine (wrong family or encoding) */
export class InvalidKeyError extends GeneralSecurityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidKeyError';
  }
}

/** A key factory could not turn a key specification into a key */
export class InvalidKeySpecError extends GeneralSecurityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidKeySpecError';
  }
}

/** Engine misuse or an internal failure while signing/verifying */
export class SignatureError extends GeneralSecurityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SignatureError';
  }
}

/**
 * Extract a message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
