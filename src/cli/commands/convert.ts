import { Command } from 'commander';
import type { SingleKeyFormat } from '../../types/keys.js';
import { buildContext, type CliSession, type CommandContext, type GlobalOptions } from '../context.js';
import { parseKeyInput, parseTargetFormat } from '../keyInput.js';
import { formatJson, writeOutputFile } from '../output.js';

export type ConvertOptions = {
  to?: string;
  type?: string;
  output?: string;
  force?: boolean;
  json?: boolean;
};

export interface ConversionResult {
  originalKey: string;
  originalFormat: SingleKeyFormat;
  originalType: 'private' | 'public';
  convertedKey: string;
  targetFormat: SingleKeyFormat;
}

/**
 * Convert between hex and nsec/npub. bech32 input is recognised by prefix,
 * hex input needs `options.type`.
 */
export async function runConvert(input: string, options: ConvertOptions, ctx: CommandContext): Promise<ConversionResult> {
  const targetFormat = parseTargetFormat(options.to ?? 'hex');
  const originalKey = input.trim();

  ctx.logger('debug', 'Detecting key type and format...');
  const { key, format: originalFormat } = parseKeyInput(originalKey, options.type);
  ctx.logger('debug', `Detected ${originalFormat} ${key.role} key`);

  const result: ConversionResult = {
    originalKey,
    originalFormat,
    originalType: key.role,
    convertedKey: key.toFormat(targetFormat),
    targetFormat,
  };

  if (originalFormat === targetFormat) {
    ctx.logger('warn', `Key is already in ${targetFormat} format`);
  } else {
    ctx.logger('success', `Converted ${originalFormat} ${key.role} key to ${targetFormat} format`);
  }

  const content = options.json === true ? formatJson(result) : result.convertedKey;
  if (options.output !== undefined) {
    const written = await writeOutputFile(options.output, content, { force: options.force });
    ctx.logger('success', `Converted key written to ${written}`);
  } else {
    ctx.stdout(content);
  }
  return result;
}

export function createConvertCommand(session: CliSession): Command {
  return new Command('convert')
    .description('Convert a key between hex and bech32 (nsec/npub) formats')
    .argument('<key>', 'Key to convert')
    .option('--to <format>', 'Target format: hex or bech32', 'hex')
    .option('-t, --type <type>', 'Key type if ambiguous: private or public')
    .option('-o, --output <file>', 'Save output to file instead of displaying')
    .option('--force', 'Overwrite the output file if it exists')
    .option('-j, --json', 'Output in JSON format')
    .action(async (key: string, _options: ConvertOptions, command: Command) => {
      const options = command.optsWithGlobals<ConvertOptions & GlobalOptions>();
      await runConvert(key, options, await buildContext(options, session));
    });
}
