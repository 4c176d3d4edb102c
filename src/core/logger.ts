import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to stderr so stdout stays free for JSON and SARIF output. */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: chalk.dim('[debug]'),
  info: chalk.cyan('[info]'),
  warn: chalk.yellow('[warn]'),
  error: chalk.red('[error]'),
};

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.STAGEGATE_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? (isDebugEnabled() ? 'debug' : 'info');
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ' ' + chalk.dim(JSON.stringify(meta)) : '';
    write(`${LEVEL_TAG[entryLevel]} ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
