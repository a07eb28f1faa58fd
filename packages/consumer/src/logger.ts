export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type Writer = (line: string) => void;

const stdoutWriter: Writer = (line) => {
  process.stdout.write(line);
};

/**
 * JSON-lines logger. `child` loggers add fixed fields to every entry.
 */
export class Logger {
  private level: number;
  private bindings: Record<string, unknown>;
  private write: Writer;

  constructor(
    level: LogLevel = 'info',
    bindings: Record<string, unknown> = {},
    write: Writer = stdoutWriter
  ) {
    this.level = LEVELS[level] ?? LEVELS.info;
    this.bindings = bindings;
    this.write = write;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger('info', { ...this.bindings, ...bindings }, this.write);
    child.level = this.level;
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < this.level) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
      ...(data ? serializeErrors(data) : undefined),
    };
    this.write(JSON.stringify(entry) + '\n');
  }
}

// Error instances stringify to {}, so flatten them first
function serializeErrors(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}
