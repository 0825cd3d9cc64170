import chalk from 'chalk';
import dayjs from 'dayjs';
import { jsonStringifySafeBigint } from './json.js';
import { normalizeError, shortStack } from './errors.js';

export type LogLevel = 'silent' | 'info' | 'debug';

const RANK: Record<LogLevel, number> = { silent: 0, info: 1, debug: 2 };

let level: LogLevel | null = null;

function isLogLevel(v: string | undefined): v is LogLevel {
  return v === 'silent' || v === 'info' || v === 'debug';
}

export function setLogLevel(next: LogLevel | null) {
  level = next;
}

export function getLogLevel(): LogLevel {
  if (level) return level;
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function enabled(min: LogLevel) {
  return RANK[getLogLevel()] >= RANK[min];
}

const ts = () => dayjs().format('YYYY-MM-DD HH:mm:ss');

function head(symbol: string, msg: string, scope?: string) {
  const where = scope ? `${chalk.magenta(`[${scope}]`)} ` : '';
  return `${chalk.gray(ts())} ${symbol} ${where}${msg}`;
}

export function logInfo(msg: string, scope?: string, extra?: unknown) {
  if (!enabled('info')) return;
  console.log(head(chalk.green('●'), chalk.bold.green(msg), scope));
  if (extra !== undefined) console.log(chalk.dim(jsonStringifySafeBigint(extra)));
}

export function logWarn(msg: string, scope?: string, extra?: unknown) {
  if (!enabled('info')) return;
  console.warn(head(chalk.yellow('▲'), chalk.bold.yellow(msg), scope));
  if (extra !== undefined) console.warn(chalk.yellow(jsonStringifySafeBigint(extra)));
}

export function logDebug(msg: string, scope?: string, extra?: unknown) {
  if (!enabled('debug')) return;
  console.log(head(chalk.blue('·'), chalk.dim(msg), scope));
  if (extra !== undefined) console.log(chalk.dim(jsonStringifySafeBigint(extra)));
}

export function logError(msg: string, scope?: string, err?: unknown) {
  if (getLogLevel() === 'silent') return;
  console.error(head(chalk.red('✖'), `${chalk.bold.bgRed.white(' ERROR ')} ${chalk.bold.red(msg)}`, scope));

  if (err !== undefined) {
    const { stack, ...details } = normalizeError(err);
    console.error(chalk.red('• details:'));
    console.error(chalk.red(jsonStringifySafeBigint(details)));
    if (stack) {
      console.error(chalk.red('• stack:'));
      console.error(chalk.red(shortStack(err, getLogLevel() === 'debug' ? 20 : 6)));
    }
  }
}
