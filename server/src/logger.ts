import util from 'util';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LEVEL_COLORS: Record<LogLevel, string> = {
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  debug: '\x1b[36m'
};

const RESET = '\x1b[0m';

function timestamp(): string {
  const now = new Date();
  return now.toISOString();
}

function format(level: LogLevel, prefix: string, message: unknown[]): string {
  const color = LEVEL_COLORS[level];
  const rendered = message
    .map((part) => (typeof part === 'string' ? part : util.inspect(part, { depth: 6, colors: false })))
    .join(' ');
  return `${timestamp()} ${color}${prefix}${RESET} ${rendered}`;
}

export const logger = {
  info(prefix: string, ...message: unknown[]): void {
    console.log(format('info', prefix, message));
  },
  warn(prefix: string, ...message: unknown[]): void {
    console.warn(format('warn', prefix, message));
  },
  error(prefix: string, ...message: unknown[]): void {
    console.error(format('error', prefix, message));
  },
  debug(prefix: string, ...message: unknown[]): void {
    if (process.env.DEBUG_LOGS) {
      console.debug(format('debug', prefix, message));
    }
  }
};

/**
 * Logger bound to one channel prefix. Components take one of these so tests
 * can pass a silent or spying implementation.
 */
export interface ChannelLogger {
  info(...message: unknown[]): void;
  warn(...message: unknown[]): void;
  error(...message: unknown[]): void;
  debug(...message: unknown[]): void;
}

export function channel(prefix: string): ChannelLogger {
  return {
    info: (...message) => logger.info(prefix, ...message),
    warn: (...message) => logger.warn(prefix, ...message),
    error: (...message) => logger.error(prefix, ...message),
    debug: (...message) => logger.debug(prefix, ...message)
  };
}

export const silentLogger: ChannelLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};

export const linkLogger = channel('[LINK]');
export const failsafeLogger = channel('[FAILSAFE]');
export const sessionLogger = channel('[SESSION]');

export function httpLog(...message: unknown[]): void {
  logger.info('[HTTP]', ...message);
}

export function wsLog(...message: unknown[]): void {
  logger.info('[WS]', ...message);
}
