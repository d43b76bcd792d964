import { once } from 'node:events';
import { Duplex, PassThrough } from 'node:stream';

import type { DestinationStream } from 'pino';

import type { SshExecChannel, SshSession } from '../../src/executor/ssh-executor.js';

const BUFFER_BYTES = 16;

/**
 * Stands in for an ssh2 exec channel: stdout is the readable side, stdin the
 * writable side, stderr a separate stream. Both outputs hold only a few
 * bytes, so a writer stalls until the executor reads.
 */
export class FakeExecChannel extends Duplex implements SshExecChannel {
  readonly stderr = new PassThrough({ highWaterMark: BUFFER_BYTES });
  inputClosed = false;
  private demand: (() => void) | null = null;

  constructor() {
    super({ readableHighWaterMark: BUFFER_BYTES, autoDestroy: false });
    this.once('finish', () => {
      this.inputClosed = true;
    });
  }

  override _read(): void {
    const resume = this.demand;
    this.demand = null;
    resume?.();
  }

  override _write(_chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback();
  }

  async writeStdout(text: string): Promise<void> {
    if (!this.push(text)) {
      await new Promise<void>((resolve) => {
        this.demand = resolve;
      });
    }
  }

  async writeStderr(text: string): Promise<void> {
    if (!this.stderr.write(text)) {
      await once(this.stderr, 'drain');
    }
  }

  /** Ends both outputs, waits until they are read, then reports the exit. */
  async exit(code: number | null, signal?: string): Promise<void> {
    const drained = [once(this, 'end')];
    if (!this.stderr.destroyed) {
      drained.push(once(this.stderr, 'end'));
      this.stderr.end();
    }
    this.push(null);
    await Promise.all(drained);
    this.emit('exit', code, signal);
    this.emit('close');
  }
}

export type ChannelScript = (channel: FakeExecChannel, command: string) => Promise<void> | void;

export interface FakeSshSessionOptions {
  openError?: Error;
  openDelayMs?: number;
  /** exec() records the command and never calls back. */
  neverOpens?: boolean;
}

export class FakeSshSession implements SshSession {
  readonly commands: string[] = [];
  readonly channels: FakeExecChannel[] = [];
  maxConcurrentOpens = 0;
  private opening = 0;

  constructor(
    private readonly script: ChannelScript,
    private readonly options: FakeSshSessionOptions = {},
  ) {}

  exec(command: string, callback: (err: Error | undefined, channel: SshExecChannel) => void): this {
    this.commands.push(command);
    if (this.options.neverOpens) {
      return this;
    }
    const channel = new FakeExecChannel();
    this.opening += 1;
    this.maxConcurrentOpens = Math.max(this.maxConcurrentOpens, this.opening);

    setTimeout(() => {
      this.opening -= 1;
      if (this.options.openError) {
        callback(this.options.openError, channel);
        return;
      }
      this.channels.push(channel);
      callback(undefined, channel);
      Promise.resolve()
        .then(() => this.script(channel, command))
        .catch((err: unknown) => {
          channel.destroy(err instanceof Error ? err : new Error(String(err)));
        });
    }, this.options.openDelayMs ?? 0);

    return this;
  }
}

export interface LogRecord {
  level: number;
  msg: string;
  stream?: string;
  [key: string]: unknown;
}

/** pino destination that keeps parsed records in memory. */
export function collectRecords(): DestinationStream & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    write(line: string) {
      const record: LogRecord = JSON.parse(line);
      records.push(record);
    },
  };
}

export function lines(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, index) => `${prefix} ${index}`);
}
