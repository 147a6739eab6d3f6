/**
 * Leveled component logging for duorank.
 *
 * Every module logs through `createLogger('<component>')`. Lines go to stderr
 * as `[HH:MM:SS] LEVEL [component] message (k=v ...)`, or as one JSON object
 * per line in JSON mode, with the component kept in its own field.
 *
 * DUORANK_LOG_LEVEL and DUORANK_LOG_JSON set the initial level and format;
 * setLogLevel() and setJsonMode() change them at run time.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EmitLevel;
  component?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in SEVERITY;
}

const envLevel = process.env.DUORANK_LOG_LEVEL;

let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let jsonMode = process.env.DUORANK_LOG_JSON === 'true';
let sink: (line: string) => void = (line) => {
  process.stderr.write(line + '\n');
};

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Redirect log output. Returns a function restoring the previous sink.
 */
export function setLogSink(next: (line: string) => void): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

/**
 * Render one entry as a text line, or as JSON when `json` is set.
 */
export function formatEntry(entry: LogEntry, json: boolean = jsonMode): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, component, message, meta } = entry;
  const time = timestamp.slice(11, 19);
  let line = `[${time}] ${level.toUpperCase().padEnd(5)} `;
  if (component) {
    line += `[${component}] `;
  }
  line += message;

  if (meta && Object.keys(meta).length > 0) {
    line += ` (${formatMeta(meta)})`;
  }
  return line;
}

/**
 * Create a logger whose entries carry `component`.
 */
export function createLogger(component: string): Logger {
  const emit = (level: EmitLevel, message: string, meta?: Record<string, unknown>): void => {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    sink(formatEntry({ timestamp: new Date().toISOString(), level, component, message, meta }));
  };

  return {
    debug: (msg, meta) => emit('debug', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    error: (msg, meta) => emit('error', msg, meta),
  };
}
