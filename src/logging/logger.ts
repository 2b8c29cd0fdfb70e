import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

/** Logger callback for CLI diagnostics. Key material is never passed through it. */
export type Logger = (level: LogLevel, message: string, data?: unknown) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

const SYMBOLS: Record<LogLevel, string> = {
  debug: '·',
  info: 'ℹ',
  success: '✓',
  warn: '⚠',
  error: '✗',
};

export interface ConsoleLoggerOptions {
  /** Lowest level that is written. Default: info. */
  minLevel?: LogLevel;
  color?: boolean;
  write?: (line: string) => void;
}

function colorFor(level: LogLevel, c: ChalkInstance): (text: string) => string {
  switch (level) {
    case 'debug':
      return c.gray;
    case 'info':
      return c.blue.bold;
    case 'success':
      return c.green.bold;
    case 'warn':
      return c.yellow.bold;
    case 'error':
      return c.red.bold;
  }
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.stack ?? data.message}`;
  if (typeof data === 'object' && data !== null) return ` ${JSON.stringify(data)}`;
  return ` ${String(data)}`;
}

/** Writes `<symbol> <message>` lines, to stderr unless `write` is given. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.minLevel ?? 'info'];
  const c = new Chalk({ level: options.color === false ? 0 : chalk.level });
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return (level, message, data) => {
    if (LEVEL_RANK[level] < minRank) return;
    const paint = colorFor(level, c);
    const text = level === 'debug' ? paint(message) : message;
    write(`${paint(SYMBOLS[level])} ${text}${formatData(data)}`);
  };
}

export const silentLogger: Logger = () => {};
