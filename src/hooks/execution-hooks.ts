import { nanoid } from 'nanoid/non-secure';

import { CommandExecutionError, type CommandExecutionErrorKind } from '../executor/errors.js';
import type {
  Command,
  ExecuteOptions,
  ExecutionOutcome,
  OutputStreamName,
  SinkFailure,
} from '../executor/types.js';

export interface CommandContext {
  /** Node the command runs on. */
  node: string;
  command: Command;
  options: ExecuteOptions;
}

export interface ExecutionContextMetadata {
  /** Shared by the hooks, the telemetry events and the log file names. */
  invocationId: string;
  startedAt: Date;
}

export function createExecutionMetadata(): ExecutionContextMetadata {
  return { invocationId: nanoid(12), startedAt: new Date() };
}

export interface ExecutionHookArgs {
  context: CommandContext;
  metadata: ExecutionContextMetadata;
}

export interface ExecutionHookResultArgs extends ExecutionHookArgs {
  outcome: ExecutionOutcome;
  lines: Record<OutputStreamName, number>;
  /** Streams whose log file stopped accepting lines during the call. */
  sinkFailures: readonly SinkFailure[];
}

export interface ExecutionHookErrorArgs extends ExecutionHookArgs {
  error: Error;
  /** `unknown` when the error did not come from an executor. */
  kind: CommandExecutionErrorKind | 'unknown';
  /** Set when the command finished but its exit status was rejected. */
  outcome?: ExecutionOutcome;
}

/** Observers of a command service call; implement only what you need. */
export interface ExecutionHooks {
  beforeExecute?(args: ExecutionHookArgs): Promise<void> | void;
  afterExecute?(args: ExecutionHookResultArgs): Promise<void> | void;
  onError?(args: ExecutionHookErrorArgs): Promise<void> | void;
}

export interface HookManagerOptions {
  hooks?: ExecutionHooks | ExecutionHooks[];
}

/** Runs the registered hooks one after another, in registration order. */
export class ExecutionHookManager {
  private readonly hooks: readonly ExecutionHooks[];

  constructor(options: HookManagerOptions = {}) {
    const { hooks } = options;
    this.hooks = hooks === undefined ? [] : Array.isArray(hooks) ? hooks : [hooks];
  }

  async runBefore(context: CommandContext, metadata: ExecutionContextMetadata): Promise<void> {
    for (const hook of this.hooks) {
      await hook.beforeExecute?.({ context, metadata });
    }
  }

  async runAfter(
    context: CommandContext,
    metadata: ExecutionContextMetadata,
    outcome: ExecutionOutcome,
  ): Promise<void> {
    const args: ExecutionHookResultArgs = {
      context,
      metadata,
      outcome,
      lines: { stdout: outcome.stdoutLines, stderr: outcome.stderrLines },
      sinkFailures: outcome.sinkFailures,
    };
    for (const hook of this.hooks) {
      await hook.afterExecute?.(args);
    }
  }

  async runError(
    context: CommandContext,
    metadata: ExecutionContextMetadata,
    error: Error,
  ): Promise<void> {
    const known = error instanceof CommandExecutionError ? error : undefined;
    const args: ExecutionHookErrorArgs = {
      context,
      metadata,
      error,
      kind: known?.kind ?? 'unknown',
      outcome: known?.outcome,
    };
    for (const hook of this.hooks) {
      await hook.onError?.(args);
    }
  }
}
