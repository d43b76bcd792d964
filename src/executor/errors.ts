import type { ExecutionOutcome, OutputStreamName } from './types.js';

export type CommandExecutionErrorKind =
  | 'transport'
  | 'stream'
  | 'sink'
  | 'exit'
  | 'cancelled'
  | 'config';

export interface CommandExecutionErrorOptions extends ErrorOptions {
  /** Output stream the failure belongs to, for `stream` and `sink` errors. */
  stream?: OutputStreamName;
  /** Partial or final outcome, for `exit` errors. */
  outcome?: ExecutionOutcome;
}

export class CommandExecutionError extends Error {
  readonly stream?: OutputStreamName;
  readonly outcome?: ExecutionOutcome;

  constructor(
    readonly kind: CommandExecutionErrorKind,
    message: string,
    options: CommandExecutionErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CommandExecutionError';
    this.stream = options.stream;
    this.outcome = options.outcome;
  }
}

export function enrichError(
  error: unknown,
  kind: CommandExecutionErrorKind,
  target: string,
  stream?: OutputStreamName,
): CommandExecutionError {
  if (error instanceof CommandExecutionError) {
    return error;
  }

  const where = stream ? `${target} ${stream}` : target;

  if (error instanceof Error) {
    return new CommandExecutionError(kind, `${error.message} (${where})`, {
      cause: error,
      stream,
    });
  }

  return new CommandExecutionError(kind, `Unknown ${kind} error on ${where}: ${String(error)}`, {
    stream,
  });
}
