import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

// HH:MM:SS.mmm, local time
function stamp(): string {
  const now = new Date();
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function line(tag: string, msg: string): string {
  return `${chalk.dim(stamp())} ${tag} ${msg}`;
}

export function debug(msg: string, ...args: unknown[]): void {
  if (shouldLog('debug')) console.log(line(chalk.gray('[DEBUG]'), chalk.gray(msg)), ...args);
}

export function info(msg: string, ...args: unknown[]): void {
  if (shouldLog('info')) console.log(line(chalk.blue('[INFO]'), msg), ...args);
}

export function success(msg: string, ...args: unknown[]): void {
  if (shouldLog('info')) console.log(line(chalk.green('[OK]'), msg), ...args);
}

// Warnings and errors go to stderr.
export function warn(msg: string, ...args: unknown[]): void {
  if (shouldLog('warn')) console.error(line(chalk.yellow('[WARN]'), chalk.yellow(msg)), ...args);
}

export function error(msg: string, ...args: unknown[]): void {
  if (shouldLog('error')) console.error(line(chalk.red('[ERROR]'), chalk.red(msg)), ...args);
}
