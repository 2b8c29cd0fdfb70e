import { Command } from 'commander';
import { KeyCodec } from '../../crypto/KeyCodec.js';
import { ValidationError } from '../../errors/KeytoolError.js';
import { buildContext, type CliSession, type CommandContext, type GlobalOptions } from '../context.js';
import { detectKeyKind, type KeyKind } from '../keyInput.js';

export type ExpectedKeyType = 'private' | 'public' | 'nsec' | 'npub';

const ACCEPTED_KINDS: Record<ExpectedKeyType, readonly KeyKind[]> = {
  private: ['hex', 'nsec'],
  public: ['hex', 'npub'],
  nsec: ['nsec'],
  npub: ['npub'],
};

const PURPOSE: Record<KeyKind, string> = {
  hex: 'private or public',
  nsec: 'private',
  npub: 'public',
};

export interface KeyValidationReport {
  valid: boolean;
  kind: KeyKind;
  purpose: string;
  reasons: string[];
}

function isExpectedKeyType(value: string): value is ExpectedKeyType {
  return Object.hasOwn(ACCEPTED_KINDS, value);
}

export function parseExpectedType(value: string): ExpectedKeyType {
  const type = value.trim().toLowerCase();
  if (isExpectedKeyType(type)) return type;
  throw ValidationError.invalidArgument(`Invalid key type: ${value} (valid types: private, public, nsec, npub)`, {
    value,
  });
}

/**
 * Check a key string's format, and optionally that it is of the expected type.
 * @throws ValidationError when the kind cannot be detected or the type is unknown.
 */
export function validateKey(input: string, expectedType?: string): KeyValidationReport {
  const key = input.trim();
  const expected = expectedType !== undefined ? parseExpectedType(expectedType) : undefined;
  const kind = detectKeyKind(key);
  if (kind === undefined) {
    throw ValidationError.invalidArgument(
      'Could not detect key type: key must be 64-character hex or start with nsec/npub',
      { length: key.length },
    );
  }

  const reasons: string[] = [];
  if (kind !== 'hex') {
    const result = KeyCodec.decodePseudoBech32(key, kind);
    if (!result.ok) reasons.push(result.error.message);
  }
  if (reasons.length === 0 && expected !== undefined && !ACCEPTED_KINDS[expected].includes(kind)) {
    reasons.push(`Expected ${expected}, got ${kind}`);
  }

  return { valid: reasons.length === 0, kind, purpose: PURPOSE[kind], reasons };
}

/** @throws ValidationError carrying the reasons when the key is invalid. */
export async function runValidate(
  key: string,
  options: { type?: string },
  ctx: CommandContext,
): Promise<KeyValidationReport> {
  const report = validateKey(key, options.type);
  if (!report.valid) {
    throw ValidationError.invalidKey(report.reasons);
  }
  ctx.logger('success', `Valid ${report.kind} key (${report.purpose})`);
  ctx.logger('debug', `Key type: ${report.kind}`);
  ctx.logger('debug', `Key length: ${key.trim().length} characters`);
  ctx.logger('debug', `Format: ${report.kind === 'hex' ? 'Hexadecimal' : 'bech32 (base58, non-standard)'}`);
  return report;
}

export function createValidateCommand(session: CliSession): Command {
  return new Command('validate')
    .description('Validate a Nostr key format')
    .argument('<key>', 'Key to validate (hex or nsec/npub format)')
    .option('-t, --type <type>', 'Expected key type: private, public, nsec, npub')
    .action(async (key: string, _options: { type?: string }, command: Command) => {
      const options = command.optsWithGlobals<{ type?: string } & GlobalOptions>();
      await runValidate(key, options, await buildContext(options, session));
    });
}
