// Core codec
export { KeyCodec, KEY_LENGTH } from './crypto/KeyCodec.js';
export type { DecodeResult } from './crypto/KeyCodec.js';

// Keys
export { Key } from './keys/Key.js';
export { PrivateKey } from './keys/PrivateKey.js';
export { PublicKey } from './keys/PublicKey.js';
export { Keypair } from './keys/Keypair.js';
export type { KeypairOutput } from './keys/Keypair.js';

// Errors
export {
  KeytoolError,
  CryptographicError,
  KeyFormatError,
  ValidationError,
  ConfigurationError,
} from './errors/KeytoolError.js';
export type { KeytoolErrorData, ErrorCode } from './types/errors.js';
export { ErrorCodes } from './types/errors.js';

// Types
export type {
  HexString,
  KeyHex,
  PseudoBech32,
  KeyRole,
  KeyPrefix,
  KeyFormat,
  SingleKeyFormat,
  RawKeypair,
  FormattedKeypair,
  FormattedKeypairBoth,
} from './types/keys.js';
export { KEY_FORMATS, PREFIX_FOR_ROLE, isKeyFormat } from './types/keys.js';

// Config
export { loadConfig, getConfigDir, getConfigFilePath, DEFAULT_CONFIG, KeytoolConfigSchema } from './config/config.js';
export type { KeytoolConfig, LoadConfigOptions } from './config/config.js';

// Logging
export { createConsoleLogger, silentLogger } from './logging/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logging/logger.js';

// CLI
export { createProgram, runCli } from './cli/program.js';
export type { CliIo, CommandContext } from './cli/context.js';
