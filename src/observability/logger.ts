import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.blue('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length ? ' ' + chalk.gray(parts.join(' ')) : '';
}

export function createConsoleLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = ORDER[level];
  const write = (lvl: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (ORDER[lvl] < threshold) return;
    const prefix = scope ? chalk.cyan(`[${scope}] `) : '';
    const line = `${chalk.gray(new Date().toISOString())} ${LABELS[lvl]} ${prefix}${message}${formatFields(fields)}`;
    if (lvl === 'error' || lvl === 'warn') console.error(line);
    else console.log(line);
  };
  return {
    debug: (m, f) => write('debug', m, f),
    info: (m, f) => write('info', m, f),
    warn: (m, f) => write('warn', m, f),
    error: (m, f) => write('error', m, f),
    child: (childScope) => createConsoleLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
