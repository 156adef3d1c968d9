import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLevel: LogLevel = 'info';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

export function debug(msg: string, ...args: unknown[]): void {
  if (shouldLog('debug')) console.log(chalk.gray(`[DEBUG] ${msg}`), ...args);
}

export function info(msg: string, ...args: unknown[]): void {
  if (shouldLog('info')) console.log(chalk.blue(`[INFO] ${msg}`), ...args);
}

export function warn(msg: string, ...args: unknown[]): void {
  if (shouldLog('warn')) console.log(chalk.yellow(`[WARN] ${msg}`), ...args);
}

export function error(msg: string, ...args: unknown[]): void {
  if (shouldLog('error')) console.error(chalk.red(`[ERROR] ${msg}`), ...args);
}

export interface ScopedLogger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Named log stream. Lines are prefixed with the scope so that, e.g., worker
 * output can be told apart from the bot's own messages.
 */
export function scope(name: string): ScopedLogger {
  const tag = chalk.magenta(`[${name}]`);
  return {
    debug: (msg, ...args) => debug(`${tag} ${msg}`, ...args),
    info: (msg, ...args) => info(`${tag} ${msg}`, ...args),
    warn: (msg, ...args) => warn(`${tag} ${msg}`, ...args),
    error: (msg, ...args) => error(`${tag} ${msg}`, ...args),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
