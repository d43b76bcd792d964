import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig, ConfigLoadError } from './config/loader.js';
import { CommandExecutionError } from './executor/errors.js';
import { ExecutionHookManager } from './hooks/index.js';
import { RunLogDirectory, TelemetryLogger } from './logging/index.js';
import { CommandService, executeArgsShape } from './services/command-service.js';
import type { ExecuteResponse } from './services/command-service.js';
import { ExecutorRegistry } from './services/executor-registry.js';

export function formatOutcomeText(result: ExecuteResponse): string {
  const status = result.success
    ? 'succeeded'
    : result.signal
      ? `was killed by ${result.signal}`
      : `exited with code ${result.exitCode ?? 'null'}`;
  const lines = [
    `Command on ${result.node} ${status} in ${result.durationMs}ms: ${result.command}`,
    `stdout: ${result.stdoutLines} lines -> ${result.stdoutLog}`,
    `stderr: ${result.stderrLines} lines -> ${result.stderrLog}`,
  ];
  for (const failure of result.sinkFailures) {
    lines.push(`${failure.stream} log sink failed: ${failure.message}`);
  }
  return lines.join('\n');
}

export async function bootstrap(): Promise<void> {
  let config;
  try {
    config = await loadConfig();
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      console.error(error.message);
    }
    throw error;
  }

  const telemetry = new TelemetryLogger();
  const registry = new ExecutorRegistry({
    config,
    loggerFor: (node) => telemetry.executorLogger(node),
  });
  const logs = new RunLogDirectory(config.logDirectory);

  const service = new CommandService({
    executors: registry,
    logs,
    hooks: new ExecutionHookManager(),
    telemetry,
  });

  const server = new McpServer(
    {
      name: 'testbed-exec',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    },
  );

  server.tool(
    'execute',
    `Run a shell command on a testbed node (${registry.nodeNames().join(', ')}); output is logged per stream under ${logs.path}`,
    executeArgsShape,
    async (args, extra) => {
      let result: ExecuteResponse;
      try {
        result = await service.execute(args, { signal: extra.signal });
      } catch (error) {
        if (error instanceof CommandExecutionError && error.kind === 'exit' && error.outcome) {
          return {
            content: [{ type: 'text', text: error.message }],
            isError: true,
          };
        }
        throw error;
      }

      return {
        content: [{ type: 'text', text: formatOutcomeText(result) }],
        structuredContent: { ...result },
        isError: !result.success,
      };
    },
  );

  const transportServer = new StdioServerTransport();
  await server.connect(transportServer);

  const shutdown = async () => {
    await registry.dispose();
    await server.close();
  };

  process.on('SIGINT', () => {
    void shutdown().finally(() => process.exit(0));
  });

  process.on('SIGTERM', () => {
    void shutdown().finally(() => process.exit(0));
  });
}
