export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const PREFIX = '[expenses-importer]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: number = LEVELS[isLogLevel(envLevel) ? envLevel : 'info'];

function write(level: LogLevel, sink: (...args: unknown[]) => void, message: string, data?: unknown) {
  if (LEVELS[level] < threshold) return;
  if (data === undefined) {
    sink(`${PREFIX} ${message}`);
  } else {
    sink(`${PREFIX} ${message}`, data);
  }
}

export const logger = {
  debug: (message: string, data?: unknown) => write('debug', console.log, message, data),
  info: (message: string, data?: unknown) => write('info', console.info, message, data),
  warn: (message: string, data?: unknown) => write('warn', console.warn, message, data),
  error: (message: string, error?: unknown) => write('error', console.error, message, error),
  setLevel: (level: LogLevel) => {
    threshold = LEVELS[level];
  },
  silence: () => {
    threshold = Number.POSITIVE_INFINITY;
  },
};
