export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);

const initialLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(initialLevel) ? initialLevel : 'info';

const write = (level: LogLevel, message: string, meta?: LogMeta) => {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
    return;
  }

  const suffix = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix}`;

  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const logger = {
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  error: (message: string, meta?: LogMeta) => write('error', message, meta),
  setLevel: (level: LogLevel) => {
    threshold = level;
  }
};
