export { LogSink, withLogSink, type LineSink, type LogSinkOptions, type LogSinkTarget } from './log-sink.js';
export { RunLogDirectory, type InvocationLogPaths } from './run-directory.js';
export { pumpStream, type StreamPumpOptions } from './stream-pump.js';
export {
  TelemetryLogger,
  LOG_PATH_ENV_VAR,
  type CommandErrorEvent,
  type CommandLogContext,
  type CommandResultEvent,
  type CommandStartEvent,
  type TelemetryLoggerOptions,
} from './telemetry-logger.js';
