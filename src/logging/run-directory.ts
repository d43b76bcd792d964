import path from 'node:path';

import { nanoid } from 'nanoid/non-secure';

export interface InvocationLogPaths {
  stdout: string;
  stderr: string;
}

function timestampSegment(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

/**
 * `<root>/<runId>/<node>/<invocationId>.{stdout,stderr}.log`
 *
 * Directories are created by the sinks when the first file is opened.
 */
export class RunLogDirectory {
  readonly path: string;

  constructor(
    readonly root: string,
    readonly runId: string = `${timestampSegment(new Date())}-${nanoid(6)}`,
  ) {
    this.path = path.resolve(root, runId);
  }

  invocationLogs(node: string, invocationId: string): InvocationLogPaths {
    const base = path.join(this.path, node, invocationId);
    return {
      stdout: `${base}.stdout.log`,
      stderr: `${base}.stderr.log`,
    };
  }
}
