export const ErrorCodes = {
  // Cryptographic failures (1xxx)
  INVALID_SCALAR: 1001,
  INVALID_KEY_LENGTH: 1002,

  // Key format failures (2xxx)
  INVALID_HEX: 2001,
  INVALID_PREFIX: 2002,
  INVALID_BASE58: 2003,
  INVALID_PAYLOAD_LENGTH: 2004,
  KEYPAIR_MISMATCH: 2005,

  // Input validation failures (3xxx)
  INVALID_ARGUMENT: 3001,
  UNSUPPORTED_FORMAT: 3002,
  OUTPUT_PATH_INVALID: 3003,
  INVALID_KEY: 3004,

  // Configuration failures (4xxx)
  CONFIG_UNREADABLE: 4001,
  CONFIG_INVALID: 4002,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface KeytoolErrorData {
  code: ErrorCode;
  message: string;
  data?: Record<string, unknown>;
}
