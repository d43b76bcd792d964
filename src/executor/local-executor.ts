import { spawn } from 'node:child_process';

import { BaseCommandExecutor, type BaseExecutorOptions } from './base.js';
import { enrichError } from './errors.js';
import type { ExecutionChannel, ExitStatus } from './types.js';

export interface LocalCommandExecutorOptions extends BaseExecutorOptions {
  /** Shell that interprets the composed command line. Defaults to `/bin/sh`. */
  shellPath?: string;
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Runs commands as child processes of the orchestrator.
 */
export class LocalCommandExecutor extends BaseCommandExecutor {
  private readonly shellPath: string;
  private readonly cwd?: string;
  private readonly env?: Record<string, string>;

  constructor(options: LocalCommandExecutorOptions) {
    super(options);
    this.shellPath = options.shellPath ?? '/bin/sh';
    this.cwd = options.cwd;
    this.env = options.env;
  }

  protected async openChannel(commandLine: string): Promise<ExecutionChannel> {
    const child = spawn(this.shellPath, ['-c', commandLine], {
      cwd: this.cwd,
      env: this.env ? { ...process.env, ...this.env } : process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const completion = new Promise<ExitStatus>((resolve, reject) => {
      child.on('error', (err) => reject(enrichError(err, 'transport', this.name)));
      child.once('close', (code, signal) => resolve({ exitCode: code, signal }));
    });

    child.stdin.on('error', (err) => {
      this.getLogger().debug({ err }, 'Command closed its input early');
    });

    return {
      stdout: child.stdout,
      stderr: child.stderr,
      completion,
      closeInput: () => {
        child.stdin.end();
      },
      destroy: () => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
        child.stdout.destroy();
        child.stderr.destroy();
      },
    };
  }
}
