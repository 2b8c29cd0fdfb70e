import { Command } from 'commander';
import { ValidationError } from '../../errors/KeytoolError.js';
import { Keypair } from '../../keys/Keypair.js';
import { isKeyFormat, type KeyFormat } from '../../types/keys.js';
import { buildContext, type CliSession, type CommandContext, type GlobalOptions } from '../context.js';
import { checkOutputPath, formatJson, formatKeypairBothText, formatKeypairText, writeOutputFile } from '../output.js';

export type GenerateOptions = {
  format?: string;
  output?: string;
  force?: boolean;
  json?: boolean;
};

export function parseKeyFormat(value: string): KeyFormat {
  const format = value.trim().toLowerCase();
  if (isKeyFormat(format)) return format;
  throw ValidationError.invalidArgument(`Invalid format '${value}'. Must be one of: hex, bech32, both`, { value });
}

export function renderKeypair(keypair: Keypair, format: KeyFormat, json: boolean): string {
  if (format === 'both') {
    const keys = keypair.toFormat('both');
    return json ? formatJson({ ...keys, format }) : formatKeypairBothText(keys);
  }
  const keys = keypair.toFormat(format);
  return json ? formatJson({ ...keys, format }) : formatKeypairText(keys);
}

export async function runGenerate(options: GenerateOptions, ctx: CommandContext): Promise<Keypair> {
  const format = options.format !== undefined ? parseKeyFormat(options.format) : ctx.config.defaultFormat;
  if (options.output !== undefined) {
    await checkOutputPath(options.output);
  }

  ctx.logger('debug', 'Generating cryptographically secure keypair...');
  const keypair = Keypair.generate();
  if (format !== 'hex') {
    ctx.logger('debug', 'bech32 output is base58 with an nsec/npub prefix (non-standard, not NIP-19)');
  }

  const content = renderKeypair(keypair, format, options.json === true);
  if (options.output !== undefined) {
    const written = await writeOutputFile(options.output, content, { force: options.force });
    ctx.logger('success', `Output written to ${written}`);
    ctx.logger('debug', `Keypair generated successfully in ${format.toUpperCase()} format`);
  } else {
    ctx.stdout(content);
  }
  return keypair;
}

export function createGenerateCommand(session: CliSession): Command {
  return new Command('generate')
    .description('Generate a new Nostr keypair')
    .option('-f, --format <format>', 'Output format: hex, bech32, or both')
    .option('-o, --output <file>', 'Save output to file instead of displaying')
    .option('--force', 'Overwrite the output file if it exists')
    .option('-j, --json', 'Output in JSON format')
    .action(async (_options: GenerateOptions, command: Command) => {
      const options = command.optsWithGlobals<GenerateOptions & GlobalOptions>();
      await runGenerate(options, await buildContext(options, session));
    });
}
