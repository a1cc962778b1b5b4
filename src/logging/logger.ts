/** Levels in increasing severity; `silent` sits above every emitting level. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Levels an entry can carry. */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: EntryLevel;
  message: string;
  /** Dotted path of `child` names, e.g. `navigator.extract`. */
  context?: string;
  timestamp: string;
  data?: LogData;
}

export type Transport = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Leveled logger writing to pluggable transports. Children share the
 * parent's transports, so one `addTransport` on the root reaches every
 * component. With no transport nothing is written, which is how the
 * search engine runs unless a caller opts in.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly sinks: Transport[];

  constructor(opts: LoggerOptions = {}, sinks: Transport[] = []) {
    this.level = opts.level ?? 'info';
    this.context = opts.context;
    this.sinks = sinks;
  }

  addTransport(transport: Transport): this {
    this.sinks.push(transport);
    return this;
  }

  child(name: string): Logger {
    const context = this.context === undefined ? name : `${this.context}.${name}`;
    return new Logger({ level: this.level, context }, this.sinks);
  }

  isEnabled(level: EntryLevel): boolean {
    return this.sinks.length > 0 && severity(level) >= severity(this.level);
  }

  debug(message: string, data?: LogData): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.emit('error', message, data);
  }

  private emit(level: EntryLevel, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
    if (this.context !== undefined) entry.context = this.context;
    if (data !== undefined) entry.data = data;
    this.sinks.forEach((sink) => sink(entry));
  }
}

/** One line: timestamp, level, optional `[context]`, message, optional JSON data. */
export function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase()];
  if (entry.context) parts.push(`[${entry.context}]`);
  parts.push(entry.message);
  if (entry.data) parts.push(JSON.stringify(entry.data));
  return parts.join(' ');
}

export function stderrTransport(entry: LogEntry): void {
  process.stderr.write(`${formatEntry(entry)}\n`);
}
