import type { Logger } from 'pino';

import type { NodeConfig, SshNodeConfig, TestbedConfig } from '../config/types.js';
import { CommandExecutionError } from '../executor/errors.js';
import { LocalCommandExecutor } from '../executor/local-executor.js';
import { SshCommandExecutor, type SshSession } from '../executor/ssh-executor.js';
import type { CommandExecutor } from '../executor/types.js';
import { openSshSession } from '../session/ssh-session.js';

/** A session the registry can close at the end of a run. */
export interface ManagedSshSession extends SshSession {
  end(): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
}

export type SessionFactory = (node: SshNodeConfig) => Promise<ManagedSshSession>;

export interface ExecutorRegistryOptions {
  config: TestbedConfig;
  /** Parent of every executor's logger. */
  loggerFor: (node: string) => Logger;
  connect?: SessionFactory;
}

/**
 * Builds one executor per configured node. SSH sessions are opened on first
 * use, shared by later calls on the same node, and dropped when the remote
 * side closes them.
 */
export class ExecutorRegistry {
  private readonly nodes: Map<string, NodeConfig>;
  private readonly loggerFor: (node: string) => Logger;
  private readonly connect: SessionFactory;
  private readonly executors = new Map<string, Promise<CommandExecutor>>();
  private readonly sessions = new Map<string, ManagedSshSession>();
  private readonly failOnNonZeroExit: boolean;

  constructor(options: ExecutorRegistryOptions) {
    this.nodes = new Map(options.config.nodes.map((node) => [node.name, node]));
    this.loggerFor = options.loggerFor;
    this.connect = options.connect ?? openSshSession;
    this.failOnNonZeroExit = options.config.failOnNonZeroExit;
  }

  nodeNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  get(name: string): Promise<CommandExecutor> {
    const node = this.nodes.get(name);
    if (!node) {
      return Promise.reject(
        new CommandExecutionError('config', `Node '${name}' not found in configuration`),
      );
    }

    const cached = this.executors.get(name);
    if (cached) {
      return cached;
    }

    const pending = this.create(node);
    this.executors.set(name, pending);
    pending.catch(() => {
      // A failed connection is retried by the next call.
      this.executors.delete(name);
    });
    return pending;
  }

  async dispose(): Promise<void> {
    for (const session of this.sessions.values()) {
      session.end();
    }
    this.sessions.clear();
    this.executors.clear();
  }

  private async create(node: NodeConfig): Promise<CommandExecutor> {
    const logger = this.loggerFor(node.name);
    const base = {
      name: node.name,
      logger,
      elevation: node.elevation,
      failOnNonZeroExit: node.failOnNonZeroExit ?? this.failOnNonZeroExit,
    };

    switch (node.type) {
      case 'local':
        return new LocalCommandExecutor({
          ...base,
          shellPath: node.shellPath,
          cwd: node.workingDirectory,
        });
      case 'ssh': {
        const session = await this.connect(node);
        this.sessions.set(node.name, session);
        session.on('error', (err) => {
          logger.error({ err }, 'SSH session error');
        });
        session.once('close', () => {
          logger.info('SSH session closed');
          this.sessions.delete(node.name);
          this.executors.delete(node.name);
        });
        return new SshCommandExecutor({ ...base, session });
      }
      default: {
        const exhaustive: never = node;
        throw new Error(`Unsupported node type: ${String(exhaustive)}`);
      }
    }
  }
}
