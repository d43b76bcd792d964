export { BaseCommandExecutor, type BaseExecutorOptions } from './base.js';
export {
  composeCommandLine,
  composeCommandTokens,
  composeElevationPlan,
  type CompositionOptions,
} from './compose.js';
export {
  CommandExecutionError,
  enrichError,
  type CommandExecutionErrorKind,
  type CommandExecutionErrorOptions,
} from './errors.js';
export { LocalCommandExecutor, type LocalCommandExecutorOptions } from './local-executor.js';
export {
  SshCommandExecutor,
  type SshCommandExecutorOptions,
  type SshExecChannel,
  type SshSession,
} from './ssh-executor.js';
export type {
  Command,
  CommandExecutor,
  ElevationPlan,
  ElevationStrategy,
  ExecuteOptions,
  ExecutionChannel,
  ExecutionOutcome,
  ExitStatus,
  OutputStreamName,
  SinkFailure,
} from './types.js';
