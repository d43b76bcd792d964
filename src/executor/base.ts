import type { Readable } from 'node:stream';

import { nanoid } from 'nanoid/non-secure';
import type { Level, Logger } from 'pino';

import { LogSink, withLogSink, type LogSinkTarget } from '../logging/log-sink.js';
import { pumpStream } from '../logging/stream-pump.js';
import type { Command } from '../shell/arguments.js';
import { composeCommandLine } from './compose.js';
import { CommandExecutionError, enrichError } from './errors.js';
import type {
  CommandExecutor,
  ElevationStrategy,
  ExecuteOptions,
  ExecutionChannel,
  ExecutionOutcome,
  ExitStatus,
  OutputStreamName,
  SinkFailure,
} from './types.js';

export interface BaseExecutorOptions {
  name: string;
  logger: Logger;
  /** How `user` is honoured. Fixed for the executor's lifetime. */
  elevation?: ElevationStrategy;
  /** Default for `ExecuteOptions.check`. */
  failOnNonZeroExit?: boolean;
}

interface Drained {
  lines: number;
  sink: LogSink;
}

/**
 * Serializes channel creation. Channels themselves may run side by side
 * once opened.
 */
class ChannelLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Deadline and abort state of one call. Cancelling destroys the channel if
 * one is open, or the channel that arrives later.
 */
class Cancellation {
  reason: string | undefined;
  readonly whenCancelled: Promise<never>;
  private channel: ExecutionChannel | undefined;
  private rejectWait: (error: CommandExecutionError) => void = () => undefined;

  constructor(
    private readonly target: string,
    private readonly logger: Logger,
  ) {
    this.whenCancelled = new Promise<never>((_, reject) => {
      this.rejectWait = reject;
    });
    void this.whenCancelled.catch(() => undefined);
  }

  error(): CommandExecutionError {
    return new CommandExecutionError('cancelled', `Command on ${this.target} ${this.reason ?? 'aborted'}`);
  }

  cancel(reason: string): void {
    if (this.reason !== undefined) {
      return;
    }
    this.reason = reason;
    this.logger.warn({ reason }, 'Cancelling command');
    this.channel?.destroy();
    this.rejectWait(this.error());
  }

  attach(channel: ExecutionChannel): void {
    this.channel = channel;
    if (this.reason !== undefined) {
      void channel.completion.catch(() => undefined);
      channel.destroy();
    }
  }

  dispose(): void {
    this.channel?.destroy();
  }
}

function describeExit(status: ExitStatus): string {
  if (status.signal) {
    return `signal ${status.signal}`;
  }
  return status.exitCode === null ? 'no exit status' : `exit code ${status.exitCode}`;
}

export abstract class BaseCommandExecutor implements CommandExecutor {
  readonly name: string;
  readonly elevation: ElevationStrategy;
  private readonly logger: Logger;
  private readonly failOnNonZeroExit: boolean;
  private readonly lock = new ChannelLock();

  protected constructor(options: BaseExecutorOptions) {
    this.name = options.name;
    this.elevation = options.elevation ?? 'sudo';
    this.failOnNonZeroExit = options.failOnNonZeroExit ?? false;
    this.logger = options.logger.child({ executor: options.name });
  }

  getLogger(): Logger {
    return this.logger;
  }

  /** Starts `commandLine` and hands back its streams. */
  protected abstract openChannel(commandLine: string): Promise<ExecutionChannel>;

  async execute(command: Command, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const invocationId = options.invocationId ?? nanoid(12);
    const startedAt = Date.now();
    let commandLine: string;
    try {
      commandLine = composeCommandLine(command, {
        user: options.user,
        shell: options.shell,
        elevation: this.elevation,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CommandExecutionError('config', `Invalid command for ${this.name}: ${reason}`, {
        cause: err,
      });
    }
    const logger = this.logger.child({ invocationId });
    logger.debug({ command: commandLine }, 'Executing command');

    if (options.signal?.aborted) {
      throw new CommandExecutionError('cancelled', `Command on ${this.name} aborted before start`);
    }

    const cancellation = new Cancellation(this.name, logger);
    const onAbort = () => cancellation.cancel('aborted');
    options.signal?.addEventListener('abort', onAbort, { once: true });
    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => cancellation.cancel(`timed out after ${options.timeoutMs}ms`), options.timeoutMs)
        : undefined;

    try {
      const channel = await this.open(commandLine, cancellation);
      if (cancellation.reason !== undefined) {
        throw cancellation.error();
      }
      channel.closeInput();

      const completion = channel.completion.catch((err: unknown) => {
        channel.destroy();
        throw err;
      });

      const [stdout, stderr, exit] = await Promise.allSettled([
        this.drain(channel.stdout, 'stdout', 'info', options.stdout, invocationId),
        this.drain(channel.stderr, 'stderr', 'error', options.stderr, invocationId),
        completion,
      ]);

      if (cancellation.reason !== undefined) {
        throw cancellation.error();
      }
      if (exit.status === 'rejected') {
        throw enrichError(exit.reason, 'transport', this.name);
      }
      if (stdout.status === 'rejected') {
        throw enrichError(stdout.reason, 'stream', this.name, 'stdout');
      }
      if (stderr.status === 'rejected') {
        throw enrichError(stderr.reason, 'stream', this.name, 'stderr');
      }

      const sinkFailures = [stdout.value.sink.failure, stderr.value.sink.failure].filter(
        (failure): failure is SinkFailure => failure !== undefined,
      );

      const outcome: ExecutionOutcome = {
        invocationId,
        command: commandLine,
        exitCode: exit.value.exitCode,
        signal: exit.value.signal,
        success: exit.value.exitCode === 0,
        stdoutLines: stdout.value.lines,
        stderrLines: stderr.value.lines,
        sinkFailures,
        durationMs: Date.now() - startedAt,
      };

      logger.debug(
        { exitCode: outcome.exitCode, signal: outcome.signal, durationMs: outcome.durationMs },
        'Command finished',
      );

      if (!outcome.success && (options.check ?? this.failOnNonZeroExit)) {
        throw new CommandExecutionError(
          'exit',
          `Command on ${this.name} failed with ${describeExit(exit.value)}: ${commandLine}`,
          { outcome },
        );
      }

      return outcome;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener('abort', onAbort);
      cancellation.dispose();
    }
  }

  /**
   * Waits for the lock, then for the channel, giving up on either as soon as
   * the call is cancelled. The lock is released when the wait is abandoned,
   * so a session that never answers does not block later calls.
   */
  private async open(commandLine: string, cancellation: Cancellation): Promise<ExecutionChannel> {
    try {
      return await Promise.race([
        this.lock.run(() => {
          if (cancellation.reason !== undefined) {
            return Promise.reject(cancellation.error());
          }
          const opening = this.openChannel(commandLine);
          void opening.then(
            (channel) => cancellation.attach(channel),
            () => undefined,
          );
          return Promise.race([opening, cancellation.whenCancelled]);
        }),
        cancellation.whenCancelled,
      ]);
    } catch (err) {
      if (cancellation.reason !== undefined) {
        throw cancellation.error();
      }
      throw enrichError(err, 'transport', this.name);
    }
  }

  private drain(
    stream: Readable,
    name: OutputStreamName,
    level: Level,
    target: LogSinkTarget | undefined,
    invocationId: string,
  ): Promise<Drained> {
    return withLogSink(
      { logger: this.logger, level, stream: name, target, bindings: { invocationId } },
      async (sink) => ({ lines: await pumpStream({ stream, name, sink, source: this.name }), sink }),
    );
  }
}
