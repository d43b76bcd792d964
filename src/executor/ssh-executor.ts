import type { Duplex, Readable } from 'node:stream';

import { BaseCommandExecutor, type BaseExecutorOptions } from './base.js';
import { enrichError } from './errors.js';
import type { ExecutionChannel, ExitStatus } from './types.js';

/** The part of an ssh2 `ClientChannel` the executor relies on. */
export interface SshExecChannel extends Duplex {
  readonly stderr: Readable;
}

/**
 * An authenticated SSH session, e.g. an ssh2 `Client` in the ready state.
 * Its lifetime belongs to whoever created it.
 */
export interface SshSession {
  exec(command: string, callback: (err: Error | undefined, channel: SshExecChannel) => void): unknown;
}

export interface SshCommandExecutorOptions extends BaseExecutorOptions {
  session: SshSession;
}

function openExecChannel(session: SshSession, commandLine: string): Promise<SshExecChannel> {
  return new Promise((resolve, reject) => {
    session.exec(commandLine, (err, channel) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(channel);
    });
  });
}

function watchCompletion(channel: SshExecChannel, target: string): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    const status: ExitStatus = { exitCode: null, signal: null };

    // ssh2 reports `exit` as (code) or (null, signalName, coreDumped, description).
    channel.once('exit', (code: number | null, signal?: string) => {
      status.exitCode = typeof code === 'number' ? code : null;
      status.signal = signal ?? null;
    });
    channel.once('close', () => resolve(status));
    channel.once('error', (err: Error) => reject(enrichError(err, 'transport', target)));
  });
}

/**
 * Runs commands on a remote host over an already established SSH session.
 */
export class SshCommandExecutor extends BaseCommandExecutor {
  private readonly session: SshSession;

  constructor(options: SshCommandExecutorOptions) {
    super(options);
    this.session = options.session;
  }

  protected async openChannel(commandLine: string): Promise<ExecutionChannel> {
    const channel = await openExecChannel(this.session, commandLine);
    const completion = watchCompletion(channel, this.name);

    return {
      stdout: channel,
      stderr: channel.stderr,
      completion,
      closeInput: () => {
        channel.end();
      },
      destroy: () => {
        channel.stderr.destroy();
        channel.destroy();
      },
    };
  }
}
