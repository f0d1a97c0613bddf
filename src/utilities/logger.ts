/**
 * Structured Logger
 *
 * Leveled logging with pluggable sinks. Each entry names the component that
 * wrote it and, while a request is running, that request's case id
 * (`group/dataset.csv:label`), so interleaved output from a concurrent
 * batch can be attributed.
 *
 * The console sink writes to stderr; stdout carries the run report.
 */

import chalk from 'chalk';

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Levels an entry can carry */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  component?: string;
  /** Case id of the request being processed */
  caseId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_STYLE: Record<EntryLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/**
 * `12:00:00.000 WARN  [orchestrator] auto/coffee_sales.csv:chart  Keeping V1 only {...}`
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const parts = [
      chalk.dim(entry.timestamp.slice(11, 23)),
      LEVEL_STYLE[entry.level](entry.level.toUpperCase().padEnd(5)),
    ];
    if (entry.component) parts.push(chalk.dim(`[${entry.component}]`));
    if (entry.caseId) parts.push(chalk.bold(entry.caseId));
    parts.push(entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) parts.push(chalk.dim(JSON.stringify(entry.data)));
    process.stderr.write(`${parts.join(' ')}\n`);
  }
}

/** Keeps the most recent entries in memory */
export class MemorySink implements LogSink {
  private entries: LogEntry[] = [];

  constructor(private readonly capacity = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  /** Entries at or above `level`, optionally only those of one case */
  getEntries(filter: { level?: EntryLevel; caseId?: string } = {}): LogEntry[] {
    const min = LEVEL_PRIORITY[filter.level ?? 'debug'];
    return this.entries.filter(
      (e) => LEVEL_PRIORITY[e.level] >= min && (filter.caseId === undefined || e.caseId === filter.caseId)
    );
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

interface Attribution {
  component?: string;
  caseId?: string;
}

export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly sinks: readonly LogSink[];

  constructor(
    config: LoggerConfig = {},
    private readonly attribution: Attribution = {}
  ) {
    this.level = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
  }

  /** Child logger whose entries name this component */
  forComponent(component: string): StructuredLogger {
    return this.child({ component });
  }

  /** Child logger whose entries carry a request's case id */
  forCase(caseId: string): StructuredLogger {
    return this.child({ caseId });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  private child(attribution: Attribution): StructuredLogger {
    return new StructuredLogger({ level: this.level, sinks: [...this.sinks] }, { ...this.attribution, ...attribution });
  }

  private write(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.attribution,
      ...(data && { data }),
    };
    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

// ─── Global logger ───────────────────────────────────────────────────

/**
 * Process-wide logger: console at info until `configureLogger` runs.
 */
export let logger = new StructuredLogger();

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * Component logger over the global configuration. Call after
 * `configureLogger`; the sinks are captured when it is created.
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.forComponent(component);
}
