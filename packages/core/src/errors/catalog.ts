/**
 * Typed error catalog for the storage node and the owner client.
 *
 * Not-found outcomes are never errors: they travel as `found: false` in
 * responses. Everything here is either API misuse, an integrity failure,
 * or a timeout the caller asked for.
 */

export class CofferError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Cipher errors

export class AuthenticationError extends CofferError {
  constructor(details?: Record<string, unknown>) {
    super(
      "AUTHENTICATION_FAILED",
      "Ciphertext failed authentication",
      details,
    );
  }
}

export class KeyLengthError extends CofferError {
  constructor(expected: number, actual: number) {
    super(
      "INVALID_KEY_LENGTH",
      `Invalid key length: expected ${expected} bytes, got ${actual}`,
      { expected, actual },
    );
  }
}

// Input errors

export class InvalidBlobIdError extends CofferError {
  constructor(blobId: string) {
    super("INVALID_BLOB_ID", `Invalid blob id: ${JSON.stringify(blobId)}`, {
      blobId,
    });
  }
}

export class ConfigError extends CofferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
  }
}

// Deployment errors

export class ModeMismatchError extends CofferError {
  constructor(recorded: string, configured: string) {
    super(
      "MODE_MISMATCH",
      `Node was initialized in ${recorded} mode but is configured for ${configured}`,
      { recorded, configured },
    );
  }
}

// Client errors

export class ResponseTimeoutError extends CofferError {
  constructor(kind: string, blobId: string, timeoutMs: number) {
    super(
      "RESPONSE_TIMEOUT",
      `No ${kind} response for ${blobId} within ${timeoutMs}ms`,
      { kind, blobId, timeoutMs },
    );
  }
}
