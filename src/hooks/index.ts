export {
  ExecutionHookManager,
  createExecutionMetadata,
  type CommandContext,
  type ExecutionContextMetadata,
  type ExecutionHookArgs,
  type ExecutionHookErrorArgs,
  type ExecutionHookResultArgs,
  type ExecutionHooks,
  type HookManagerOptions,
} from './execution-hooks.js';
