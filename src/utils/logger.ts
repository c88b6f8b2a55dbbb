/**
 * Structured JSON logger.
 * One object per line; errors go to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

const defaultSink: LogSink = (level, line) => {
  if (level === 'error') process.stderr.write(line + '\n');
  else process.stdout.write(line + '\n');
};

let sink: LogSink = defaultSink;

/**
 * Redirect log output. Passing nothing restores stdout/stderr.
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? defaultSink;
}

function minLevel(): LogLevel {
  const fromEnv = process.env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel()]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg: message,
    ...data,
  };
  sink(level, JSON.stringify(entry));
}

export const simLog = {
  debug: (component: string, msg: string, data?: Record<string, unknown>) => log('debug', component, msg, data),
  info: (component: string, msg: string, data?: Record<string, unknown>) => log('info', component, msg, data),
  warn: (component: string, msg: string, data?: Record<string, unknown>) => log('warn', component, msg, data),
  error: (component: string, msg: string, data?: Record<string, unknown>) => log('error', component, msg, data),
};
