import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';

import { enrichError } from '../executor/errors.js';
import type { OutputStreamName } from '../executor/types.js';
import type { LineSink } from './log-sink.js';

export interface StreamPumpOptions {
  stream: Readable;
  name: OutputStreamName;
  sink: LineSink;
  /** Used in error messages, e.g. the executor name. */
  source?: string;
}

/**
 * Forwards every line of `stream` to `sink` in arrival order and resolves
 * with the number of lines once the stream has ended or closed. A read
 * error rejects with a `stream` error tagged with `name`.
 */
export function pumpStream(options: StreamPumpOptions): Promise<number> {
  const { stream, name, sink, source = 'channel' } = options;
  const decoder = new StringDecoder('utf8');
  let pending = '';
  let lines = 0;

  const emit = (line: string) => {
    lines += 1;
    sink.log(line.endsWith('\r') ? line.slice(0, -1) : line);
  };

  return new Promise<number>((resolve, reject) => {
    let settled = false;

    const cleanup = () => {
      stream.off('data', onData);
      stream.off('end', onFinish);
      stream.off('close', onFinish);
    };

    function onData(chunk: Buffer | string): void {
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        emit(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    }

    function onFinish(): void {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      pending += decoder.end();
      if (pending.length > 0) {
        emit(pending);
        pending = '';
      }
      resolve(lines);
    }

    function onError(error: Error): void {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      reject(enrichError(error, 'stream', source, name));
    }

    stream.on('data', onData);
    stream.once('end', onFinish);
    stream.once('close', onFinish);
    stream.on('error', onError);
  });
}
