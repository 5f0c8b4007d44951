export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type WritableLevel = Exclude<LogLevel, 'silent'>;

export type LogSink = (level: WritableLevel, line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(tag: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  tag?: string;
  sink?: LogSink;
  clock?: () => Date;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const consoleSink: LogSink = (level, line) => {
  if (level === 'warn' || level === 'error') console.error(line);
  else console.log(line);
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? 'warn';
  const sink = opts.sink ?? consoleSink;
  const clock = opts.clock ?? (() => new Date());
  const prefix = opts.tag ? `[${opts.tag}] ` : '';

  const write = (at: WritableLevel, message: string) => {
    if (RANK[at] < RANK[level]) return;
    sink(at, `${clock().toISOString()} ${at.toUpperCase()} ${prefix}${message}`);
  };

  return {
    debug: m => write('debug', m),
    info: m => write('info', m),
    warn: m => write('warn', m),
    error: m => write('error', m),
    child: tag => createLogger({ ...opts, tag: opts.tag ? `${opts.tag}:${tag}` : tag }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
