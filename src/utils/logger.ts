/**
 * Structured logging for signalpath.
 *
 * Each module gets a logger tagged with its name. Per-message work derives
 * child loggers that carry `sessionId` and `stage`, so every line of one
 * message can be grepped out of the stream. Output goes to stderr, leaving
 * stdout to CLI results.
 *
 * `SIGNALPATH_LOG_LEVEL` (debug | info | warn | error | silent) sets the
 * threshold; `SIGNALPATH_LOG_JSON=true` switches to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Logger that adds `bindings` to every line. Fields given at the call win. */
  child(bindings: LogFields): Logger;
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

const output = {
  level: parseLevel(process.env.SIGNALPATH_LOG_LEVEL),
  json: process.env.SIGNALPATH_LOG_JSON === 'true',
};

export function setLogLevel(level: LogLevel): void {
  output.level = level;
}

export function setJsonMode(enabled: boolean): void {
  output.json = enabled;
}

function renderValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function render(module: string, level: EmitLevel, msg: string, fields: LogFields): string {
  const now = new Date().toISOString();
  // undefined fields are left out of both formats
  const entries = Object.entries(fields).filter(([, value]) => value !== undefined);

  if (output.json) {
    return JSON.stringify({ time: now, level, module, msg, ...Object.fromEntries(entries) });
  }

  const tail = entries.length > 0 ? ` (${entries.map(([k, v]) => `${k}=${renderValue(v)}`).join(' ')})` : '';
  return `[${now.slice(11, 19)}] ${level.toUpperCase().padEnd(5)} [${module}] ${msg}${tail}`;
}

class ModuleLogger implements Logger {
  constructor(
    private readonly module: string,
    private readonly bindings: LogFields,
  ) {}

  debug(msg: string, fields?: LogFields): void {
    this.emit('debug', msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit('info', msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit('warn', msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit('error', msg, fields);
  }

  child(bindings: LogFields): Logger {
    return new ModuleLogger(this.module, { ...this.bindings, ...bindings });
  }

  private emit(level: EmitLevel, msg: string, fields: LogFields = {}): void {
    if (SEVERITY[level] < SEVERITY[output.level]) return;
    process.stderr.write(render(this.module, level, msg, { ...this.bindings, ...fields }) + '\n');
  }
}

/**
 * Logger for one module, optionally with fields bound from the start.
 */
export function createLogger(module: string, bindings: LogFields = {}): Logger {
  return new ModuleLogger(module, bindings);
}
