export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const settings: { level: LogLevel; format: LogFormat } = { level: 'info', format: 'text' };

export function configureLogger(opts: { level?: LogLevel; format?: LogFormat }): void {
  if (opts.level) settings.level = opts.level;
  if (opts.format) settings.format = opts.format;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[settings.level]) return;
  const ts = new Date().toISOString();
  const out = settings.format === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...meta })
    : meta ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta)}`
           : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log('warn',  msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};
