import path from 'node:path';

import pino, { type DestinationStream, type Level, type Logger } from 'pino';

import type { OutputStreamName, SinkFailure } from '../executor/types.js';

/** A log file path, or a destination stream owned by the caller. */
export type LogSinkTarget = string | DestinationStream;

export interface LogSinkOptions {
  /** The executor's logger; every line is mirrored to it. */
  logger: Logger;
  level: Level;
  stream: OutputStreamName;
  target?: LogSinkTarget;
  bindings?: Record<string, unknown>;
}

export interface LineSink {
  log(line: string): void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Binds an output stream to a destination at a fixed severity. Lines go to
 * the executor's logger and, when a target is given, to that target as pino
 * records. A target that fails is dropped for the rest of the sink's life;
 * the failure is kept on the sink instead of being thrown at the reader.
 */
export class LogSink implements LineSink {
  private readonly logger: Logger;
  private target: Logger | null = null;
  private closeTarget: (() => void) | null = null;
  private failed: SinkFailure | null = null;
  private released = false;
  private count = 0;

  private constructor(private readonly options: LogSinkOptions) {
    this.logger = options.logger.child({ stream: options.stream, ...options.bindings });
  }

  static acquire(options: LogSinkOptions): LogSink {
    const sink = new LogSink(options);
    sink.open();
    return sink;
  }

  get level(): Level {
    return this.options.level;
  }

  get lines(): number {
    return this.count;
  }

  get failure(): SinkFailure | undefined {
    return this.failed ?? undefined;
  }

  get isReleased(): boolean {
    return this.released;
  }

  log(line: string): void {
    this.count += 1;
    const { level } = this.options;
    this.logger[level](line);

    if (!this.target || this.failed) {
      return;
    }
    try {
      this.target[level](line);
    } catch (err) {
      this.fail(err);
    }
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;

    const close = this.closeTarget;
    this.closeTarget = null;
    this.target = null;
    if (!close) {
      return;
    }
    try {
      close();
    } catch (err) {
      this.fail(err);
    }
  }

  private open(): void {
    const { target, level, stream, bindings } = this.options;
    if (target === undefined) {
      return;
    }

    const loggerOptions = { level, base: { stream, ...bindings } };

    if (typeof target !== 'string') {
      this.target = pino(loggerOptions, target);
      return;
    }

    try {
      const destination = pino.destination({
        dest: path.resolve(target),
        sync: true,
        mkdir: true,
        append: true,
      });
      destination.on('error', (err: unknown) => this.fail(err));
      this.target = pino(loggerOptions, destination);
      this.closeTarget = () => {
        destination.flushSync();
        destination.end();
      };
    } catch (err) {
      this.fail(err);
    }
  }

  private fail(error: unknown): void {
    if (this.failed) {
      return;
    }
    this.failed = { stream: this.options.stream, message: describeError(error) };
    this.logger.warn({ err: error }, 'Log sink target failed; further lines go to the executor log only');
  }
}

export async function withLogSink<T>(
  options: LogSinkOptions,
  consume: (sink: LogSink) => Promise<T>,
): Promise<T> {
  const sink = LogSink.acquire(options);
  try {
    return await consume(sink);
  } finally {
    sink.release();
  }
}
