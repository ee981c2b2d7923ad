import type { LogLevel } from './config.ts';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/** Optional structured context appended to a line as JSON. */
export type LogFields = Record<string, unknown>;

type LogFn = (module: string, message: string, fields?: LogFields) => void;

export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

/** Destination for formatted lines. */
export type LogSink = (line: string) => void;

export function createLogger(level: LogLevel, sink: LogSink = (line) => console.log(line)): Logger {
  const threshold = LEVELS[level] ?? LEVELS.info;
  const log = (lvl: LogLevel, module: string, message: string, fields?: LogFields) => {
    if (LEVELS[lvl] < threshold) return;
    const stamp = new Date().toISOString();
    const extra = fields && Object.keys(fields).length ? ` ${JSON.stringify(fields)}` : '';
    sink(`${stamp} | ${lvl} | ${module} | ${message}${extra}`);
  };
  return {
    debug: (module, message, fields) => log('debug', module, message, fields),
    info: (module, message, fields) => log('info', module, message, fields),
    warn: (module, message, fields) => log('warn', module, message, fields),
    error: (module, message, fields) => log('error', module, message, fields)
  };
}
