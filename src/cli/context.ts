import { loadConfig, type Env, type KeytoolConfig } from '../config/config.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';

/** Process-facing I/O, injected so commands can run inside tests. */
export interface CliIo {
  /** Writes one line of primary output (keys, JSON). */
  stdout: (line: string) => void;
  /** Writes one line of diagnostics. */
  stderr: (line: string) => void;
  env: Env;
}

export type GlobalOptions = {
  verbose?: boolean;
  color?: boolean;
  config?: string;
};

export interface CommandContext {
  logger: Logger;
  stdout: (line: string) => void;
  config: KeytoolConfig;
}

/** Logger and verbosity a run reports its failures with. */
export interface Diagnostics {
  logger: Logger;
  verbose: boolean;
}

/** State shared by the commands of one run. `diagnostics` is set once the config has loaded. */
export interface CliSession {
  readonly io: CliIo;
  diagnostics?: Diagnostics;
}

export const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
};

export async function buildContext(options: GlobalOptions, session: CliSession): Promise<CommandContext> {
  const { io } = session;
  const config = await loadConfig({ path: options.config, env: io.env });
  const verbose = options.verbose === true || config.verbose;
  const color = options.color !== false && config.color;
  const logger = createConsoleLogger({ minLevel: verbose ? 'debug' : 'info', color, write: io.stderr });
  session.diagnostics = { logger, verbose };
  return { logger, stdout: io.stdout, config };
}
