import type { Readable } from 'node:stream';

import type { Logger } from 'pino';

import type { LogSinkTarget } from '../logging/log-sink.js';
import type { Command } from '../shell/arguments.js';

export type { Command } from '../shell/arguments.js';

export type ElevationStrategy = 'sudo' | 'su';

export type OutputStreamName = 'stdout' | 'stderr';

export interface ElevationPlan {
  readonly prefix: readonly string[];
  /** `['-s', shell]` when a shell was requested, otherwise empty. */
  readonly shellFlag: readonly string[];
  readonly suffix: readonly string[];
}

export interface ExecuteOptions {
  /** Run the command as this user through the executor's elevation strategy. */
  user?: string;
  /** Interpreter to run the command with, e.g. `/bin/bash`. */
  shell?: string;
  stdout?: LogSinkTarget;
  stderr?: LogSinkTarget;
  /** Destroys the channel and fails with a `cancelled` error once elapsed. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Raise on a non-zero exit. Defaults to the executor's `failOnNonZeroExit`. */
  check?: boolean;
  /** Correlation id for logs; generated when absent. */
  invocationId?: string;
}

export interface SinkFailure {
  stream: OutputStreamName;
  message: string;
}

export interface ExecutionOutcome {
  invocationId: string;
  /** Final command line submitted to the transport. */
  command: string;
  exitCode: number | null;
  signal: string | null;
  success: boolean;
  stdoutLines: number;
  stderrLines: number;
  sinkFailures: SinkFailure[];
  durationMs: number;
}

export interface ExitStatus {
  exitCode: number | null;
  signal: string | null;
}

/**
 * Live handle on one running command. Owned by a single `execute()` call.
 */
export interface ExecutionChannel {
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Resolves once the command has exited; rejects on a transport failure. */
  readonly completion: Promise<ExitStatus>;
  closeInput(): void;
  destroy(): void;
}

export interface CommandExecutor {
  readonly name: string;
  readonly elevation: ElevationStrategy;
  getLogger(): Logger;
  execute(command: Command, options?: ExecuteOptions): Promise<ExecutionOutcome>;
}
