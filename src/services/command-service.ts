import { z } from 'zod';

import type { ExecutionHookManager, CommandContext } from '../hooks/index.js';
import { createExecutionMetadata } from '../hooks/index.js';
import type { RunLogDirectory, TelemetryLogger } from '../logging/index.js';
import { CommandExecutionError } from '../executor/errors.js';
import type { CommandExecutor, ExecutionOutcome } from '../executor/types.js';

/** Resolves a node name to its executor. */
export interface ExecutorSource {
  get(node: string): Promise<CommandExecutor>;
}

export interface CommandServiceOptions {
  executors: ExecutorSource;
  logs: RunLogDirectory;
  hooks: ExecutionHookManager;
  telemetry: TelemetryLogger;
}

export const executeArgsShape = {
  node: z.string().min(1, 'node is required'),
  command: z.union([
    z.string().min(1, 'command is required'),
    z.array(z.string()).nonempty('command must have at least one token'),
  ]),
  user: z.string().min(1).optional(),
  shell: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  check: z.boolean().optional(),
} as const;

export const executeRequestSchema = z.object(executeArgsShape);

export type ExecuteRequest = z.infer<typeof executeRequestSchema>;

export interface ExecuteResponse extends ExecutionOutcome {
  node: string;
  stdoutLog: string;
  stderrLog: string;
}

export interface ExecuteCallOptions {
  signal?: AbortSignal;
}

export class CommandService {
  private readonly executors: ExecutorSource;
  private readonly logs: RunLogDirectory;
  private readonly hooks: ExecutionHookManager;
  private readonly telemetry: TelemetryLogger;

  constructor(options: CommandServiceOptions) {
    this.executors = options.executors;
    this.logs = options.logs;
    this.hooks = options.hooks;
    this.telemetry = options.telemetry;
  }

  async execute(request: unknown, callOptions: ExecuteCallOptions = {}): Promise<ExecuteResponse> {
    const parsed = executeRequestSchema.safeParse(request);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('\n');
      throw new CommandExecutionError('config', `Invalid execute request:\n${message}`);
    }

    const input = parsed.data;
    const executor = await this.executors.get(input.node);
    const metadata = createExecutionMetadata();
    const logPaths = this.logs.invocationLogs(input.node, metadata.invocationId);
    const context: CommandContext = {
      node: input.node,
      command: input.command,
      options: {
        user: input.user,
        shell: input.shell,
        stdout: logPaths.stdout,
        stderr: logPaths.stderr,
        timeoutMs: input.timeoutMs,
        check: input.check,
        signal: callOptions.signal,
        invocationId: metadata.invocationId,
      },
    };

    await this.hooks.runBefore(context, metadata);
    this.telemetry.logCommandStart(context, metadata.invocationId);

    try {
      const outcome = await executor.execute(context.command, context.options);
      await this.hooks.runAfter(context, metadata, outcome);
      this.telemetry.logCommandResult(context, metadata.invocationId, outcome, metadata.startedAt);
      return {
        ...outcome,
        node: input.node,
        stdoutLog: logPaths.stdout,
        stderrLog: logPaths.stderr,
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      await this.hooks.runError(context, metadata, error);
      this.telemetry.logCommandError(context, metadata.invocationId, error, metadata.startedAt);
      throw error;
    }
  }
}
