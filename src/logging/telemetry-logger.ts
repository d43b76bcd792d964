import pino, { type DestinationStream, type Logger } from 'pino';

import type { ExecutionOutcome } from '../executor/types.js';
import { stringifyShellArguments } from '../shell/arguments.js';
import type { CommandContext } from '../hooks/index.js';

export const LOG_PATH_ENV_VAR = 'TESTBED_EXEC_LOG_PATH';

export interface TelemetryLoggerOptions {
  /** Log file; defaults to TESTBED_EXEC_LOG_PATH, then stderr. */
  destination?: string;
  /** Caller-owned stream, takes precedence over `destination`. */
  stream?: DestinationStream;
  level?: pino.LevelWithSilent;
}

export interface CommandLogContext {
  invocationId: string;
  node: string;
  command: string;
  user?: string;
}

export interface CommandStartEvent extends CommandLogContext {
  startedAt: string;
  timeoutMs?: number;
}

export interface CommandResultEvent extends CommandLogContext {
  finishedAt: string;
  durationMs: number;
  outcome: ExecutionOutcome;
}

export interface CommandErrorEvent extends CommandLogContext {
  finishedAt: string;
  durationMs: number;
  errorMessage: string;
  stack?: string;
}

function toLogContext(context: CommandContext, invocationId: string): CommandLogContext {
  return {
    invocationId,
    node: context.node,
    command: stringifyShellArguments(context.command),
    user: context.options.user,
  };
}

/**
 * Root logger of a run. Executors log through children of it; command
 * lifecycle events are emitted here.
 */
export class TelemetryLogger {
  private readonly logger: Logger;

  constructor(options: TelemetryLoggerOptions = {}) {
    const destination = options.destination ?? process.env[LOG_PATH_ENV_VAR];
    // stdout is reserved for the MCP stdio transport.
    const stream = options.stream ?? pino.destination(destination ?? 2);

    this.logger = pino(
      {
        name: 'testbed-exec',
        level: options.level ?? 'info',
      },
      stream,
    );
  }

  executorLogger(node: string): Logger {
    return this.logger.child({ node });
  }

  logCommandStart(context: CommandContext, invocationId: string): void {
    const event: CommandStartEvent = {
      ...toLogContext(context, invocationId),
      startedAt: new Date().toISOString(),
      timeoutMs: context.options.timeoutMs,
    };

    this.logger.info({ event: 'command:start', ...event }, 'Command execution started');
  }

  logCommandResult(
    context: CommandContext,
    invocationId: string,
    outcome: ExecutionOutcome,
    startedAt: Date,
  ): void {
    const finishedAt = new Date();
    const event: CommandResultEvent = {
      ...toLogContext(context, invocationId),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      outcome,
    };

    if (outcome.sinkFailures.length > 0) {
      this.logger.warn({ event: 'command:result', ...event }, 'Command finished with log sink failures');
      return;
    }
    this.logger.info({ event: 'command:result', ...event }, 'Command execution finished');
  }

  logCommandError(
    context: CommandContext,
    invocationId: string,
    error: Error,
    startedAt: Date,
  ): void {
    const finishedAt = new Date();
    const event: CommandErrorEvent = {
      ...toLogContext(context, invocationId),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      errorMessage: error.message,
      stack: error.stack,
    };

    this.logger.error({ event: 'command:error', ...event }, 'Command execution failed');
  }
}
