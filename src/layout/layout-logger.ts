/**
 * Lightweight structured logger for layout runs.
 *
 * Debug output (step timings, notes, position deltas) is written only
 * when debug is enabled; warnings are always written and also kept on
 * the logger so they can be returned to the caller.
 *
 * Output goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'warn';

/** Receives every formatted line the logger emits. */
export type LogSink = (level: LogLevel, line: string) => void;

/** Element positions keyed by shape id, used for delta tracking. */
export type PositionSnapshot = Map<string, { x: number; y: number }>;

export interface LayoutLogger {
  readonly scope: string;
  /** Warnings recorded so far, in emission order. */
  readonly warnings: readonly string[];
  note(category: string, message: string): void;
  warn(message: string): void;
  step<T>(name: string, fn: () => T): T;
  stepAsync(name: string, fn: () => Promise<void>): Promise<void>;
  stepAsyncWithDelta(
    name: string,
    fn: () => Promise<void>,
    snap: () => PositionSnapshot,
    count: (before: PositionSnapshot) => number
  ): Promise<void>;
  /** Names of the steps run so far, in order. */
  stepNames(): string[];
  finish(): void;
}

export interface LayoutLoggerOptions {
  debug?: boolean;
  sink?: LogSink;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(line + '\n');
};

/** Sink that drops everything; warnings are still recorded on the logger. */
export const silentSink: LogSink = () => {};

export function createLayoutLogger(scope: string, options: LayoutLoggerOptions = {}): LayoutLogger {
  return new DefaultLayoutLogger(scope, options.debug ?? false, options.sink ?? stderrSink);
}

class DefaultLayoutLogger implements LayoutLogger {
  readonly scope: string;
  private readonly debug: boolean;
  private readonly sink: LogSink;
  private readonly recorded: string[] = [];
  private readonly steps: string[] = [];
  private readonly startedAt = performance.now();

  constructor(scope: string, debug: boolean, sink: LogSink) {
    this.scope = scope;
    this.debug = debug;
    this.sink = sink;
  }

  get warnings(): readonly string[] {
    return this.recorded;
  }

  note(category: string, message: string): void {
    if (!this.debug) return;
    this.sink('debug', `[layout:${this.scope}] ${category}: ${message}`);
  }

  warn(message: string): void {
    this.recorded.push(message);
    this.sink('warn', `[layout:${this.scope}] WARN ${message}`);
  }

  step<T>(name: string, fn: () => T): T {
    this.steps.push(name);
    const t0 = performance.now();
    const result = fn();
    this.note('step', `${name} ${elapsed(t0)}ms`);
    return result;
  }

  async stepAsync(name: string, fn: () => Promise<void>): Promise<void> {
    this.steps.push(name);
    const t0 = performance.now();
    await fn();
    this.note('step', `${name} ${elapsed(t0)}ms`);
  }

  async stepAsyncWithDelta(
    name: string,
    fn: () => Promise<void>,
    snap: () => PositionSnapshot,
    count: (before: PositionSnapshot) => number
  ): Promise<void> {
    this.steps.push(name);
    const before = snap();
    const t0 = performance.now();
    await fn();
    this.note('step', `${name} ${elapsed(t0)}ms moved=${count(before)}`);
  }

  stepNames(): string[] {
    return [...this.steps];
  }

  finish(): void {
    this.note('done', `${this.steps.length} steps in ${elapsed(this.startedAt)}ms`);
  }
}

function elapsed(since: number): string {
  return (performance.now() - since).toFixed(1);
}
