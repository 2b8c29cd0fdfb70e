import { ErrorCodes, type ErrorCode, type KeytoolErrorData } from '../types/errors.js';

export class KeytoolError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeytoolError';
    this.code = code;
    this.data = data;
  }

  toJSON(): KeytoolErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  static unsupportedFormat(format: unknown): KeytoolError {
    return new KeytoolError(ErrorCodes.UNSUPPORTED_FORMAT, `Unsupported format: ${String(format)}`, {
      format: String(format),
    });
  }
}

/** Raised when the curve library rejects a scalar or a key has the wrong size for derivation. */
export class CryptographicError extends KeytoolError {
  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, data, options);
    this.name = 'CryptographicError';
  }

  static invalidScalar(cause: unknown): CryptographicError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new CryptographicError(
      ErrorCodes.INVALID_SCALAR,
      `Failed to derive public key: ${reason}`,
      undefined,
      { cause },
    );
  }

  static invalidKeyLength(length: number): CryptographicError {
    return new CryptographicError(
      ErrorCodes.INVALID_KEY_LENGTH,
      `Private key must be exactly 32 bytes, got ${length}`,
      { length },
    );
  }
}

/**
 * Raised when a textual key breaks its format's grammar.
 * Messages describe the input (length, prefix) and never carry the key itself.
 */
export class KeyFormatError extends KeytoolError {
  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(code, message, data);
    this.name = 'KeyFormatError';
  }

  static invalidHex(reason: string, length: number): KeyFormatError {
    return new KeyFormatError(ErrorCodes.INVALID_HEX, `Invalid hex key: ${reason}`, { length });
  }

  static invalidPrefix(expected: string, actual: string): KeyFormatError {
    return new KeyFormatError(
      ErrorCodes.INVALID_PREFIX,
      `Invalid bech32 key: expected prefix '${expected}', got '${actual}'`,
      { expected, actual },
    );
  }

  /** Names only the expected prefix and the input length, since an unprefixed input may be a raw secret. */
  static missingPrefix(expected: string, length: number): KeyFormatError {
    return new KeyFormatError(ErrorCodes.INVALID_PREFIX, `Invalid bech32 key: missing prefix '${expected}'`, {
      expected,
      length,
    });
  }

  static invalidBase58(prefix: string, length: number): KeyFormatError {
    return new KeyFormatError(
      ErrorCodes.INVALID_BASE58,
      `Invalid bech32 key: '${prefix}' payload is not valid base58`,
      { prefix, length },
    );
  }

  static invalidPayloadLength(prefix: string, length: number): KeyFormatError {
    return new KeyFormatError(
      ErrorCodes.INVALID_PAYLOAD_LENGTH,
      `Invalid bech32 key: '${prefix}' payload decodes to ${length} bytes, expected 32`,
      { prefix, length },
    );
  }

  static invalidByteLength(length: number): KeyFormatError {
    return new KeyFormatError(ErrorCodes.INVALID_PAYLOAD_LENGTH, `Key must be exactly 32 bytes, got ${length}`, {
      length,
    });
  }

  static keypairMismatch(): KeyFormatError {
    return new KeyFormatError(ErrorCodes.KEYPAIR_MISMATCH, 'Public key does not match private key');
  }
}

/** Raised for bad command-line input: unknown options, rejected keys, unusable output paths. */
export class ValidationError extends KeytoolError {
  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(code, message, data);
    this.name = 'ValidationError';
  }

  static invalidArgument(message: string, data?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCodes.INVALID_ARGUMENT, message, data);
  }

  static invalidKey(reasons: string[]): ValidationError {
    return new ValidationError(ErrorCodes.INVALID_KEY, 'Invalid key format', { reasons });
  }

  static outputPath(message: string, path: string): ValidationError {
    return new ValidationError(ErrorCodes.OUTPUT_PATH_INVALID, message, { path });
  }
}

export class ConfigurationError extends KeytoolError {
  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, data, options);
    this.name = 'ConfigurationError';
  }

  static unreadable(path: string, cause: unknown): ConfigurationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ConfigurationError(
      ErrorCodes.CONFIG_UNREADABLE,
      `Failed to read configuration file: ${reason}`,
      { path },
      { cause },
    );
  }

  static invalid(path: string, reason: string): ConfigurationError {
    return new ConfigurationError(ErrorCodes.CONFIG_INVALID, `Invalid configuration file: ${reason}`, { path });
  }
}
