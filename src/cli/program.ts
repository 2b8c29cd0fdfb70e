import { Command, CommanderError } from 'commander';
import { KeytoolError } from '../errors/KeytoolError.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';
import { createConvertCommand } from './commands/convert.js';
import { createDeriveCommand } from './commands/derive.js';
import { createGenerateCommand } from './commands/generate.js';
import { createValidateCommand } from './commands/validate.js';
import { processIo, type CliIo, type CliSession, type Diagnostics } from './context.js';

export const VERSION = '0.1.0';

export function createProgram(io: CliIo = processIo): Command {
  return buildProgram({ io });
}

function buildProgram(session: CliSession): Command {
  const program = new Command();

  program
    .name('nostr-keytool')
    .description('Generate, validate and convert Nostr keys')
    .version(VERSION)
    .option('-v, --verbose', 'Show diagnostic output')
    .option('--no-color', 'Disable colored output')
    .option('--config <path>', 'Path to a config file');

  const keys = new Command('keys').description('Key generation and management commands');
  keys.addCommand(createGenerateCommand(session));
  keys.addCommand(createValidateCommand(session));
  keys.addCommand(createConvertCommand(session));
  keys.addCommand(createDeriveCommand(session));
  program.addCommand(keys);

  return program;
}

function reasonsOf(err: KeytoolError): string[] {
  const reasons = err.data?.reasons;
  return Array.isArray(reasons) ? reasons.filter((r): r is string => typeof r === 'string') : [];
}

export function reportError(err: unknown, logger: Logger, verbose: boolean): void {
  if (err instanceof KeytoolError) {
    logger('error', err.message);
    for (const reason of reasonsOf(err)) {
      logger('error', `  • ${reason}`);
    }
  } else {
    logger('error', `Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (verbose && err instanceof Error && err.stack) {
    logger('debug', err.stack);
  }
}

// Used when a run fails before a command has loaded its config.
function fallbackDiagnostics(argv: readonly string[], io: CliIo): Diagnostics {
  const verbose = argv.includes('--verbose') || argv.includes('-v') || io.env.NOSTR_KEYTOOL_VERBOSE?.trim() === '1';
  const color = !argv.includes('--no-color') && !io.env.NO_COLOR;
  return { logger: createConsoleLogger({ minLevel: verbose ? 'debug' : 'info', color, write: io.stderr }), verbose };
}

/**
 * Parse `argv` (including the node and script entries) and run the command.
 * @returns process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const session: CliSession = { io };
  const program = buildProgram(session);
  // Added subcommands do not inherit these settings, so apply them to the whole tree.
  const configure = (command: Command): void => {
    command.exitOverride();
    command.configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });
    command.commands.forEach(configure);
  };
  configure(program);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    const { logger, verbose } = session.diagnostics ?? fallbackDiagnostics(argv, io);
    reportError(err, logger, verbose);
    return 1;
  }
}
