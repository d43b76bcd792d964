import { exec as execCallback } from 'node:child_process';
import { createHmac } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';

import { Client, type ConnectConfig } from 'ssh2';

import type { SshNodeConfig } from '../config/types.js';
import { CommandExecutionError, enrichError } from '../executor/errors.js';

const execPromise = promisify(execCallback);

export const PASSPHRASE_ENV_PREFIX = 'TESTBED_EXEC_PASSPHRASE_';
export const DEFAULT_KNOWN_HOSTS_PATH = path.join(os.homedir(), '.ssh', 'known_hosts');
const DEFAULT_READY_TIMEOUT_MS = 20_000;
const CREDENTIAL_OUTPUT_LIMIT = 8 * 1024;

/** A known_hosts line, either with plain host patterns or hashed (`|1|salt|hash`). */
export type KnownHostEntry =
  | { kind: 'plain'; hostnames: string[]; key: string }
  | { kind: 'hashed'; salt: Buffer; hash: string; key: string };

export type Credentials = Pick<ConnectConfig, 'privateKey' | 'passphrase' | 'agent' | 'password'>;

/** Marker lines (`@cert-authority`, `@revoked`) are not supported and skipped. */
export function parseKnownHosts(raw: string): KnownHostEntry[] {
  return raw.split(/\r?\n/).flatMap<KnownHostEntry>((line) => {
    const [hosts, , key] = line.trim().split(/\s+/);
    if (!hosts || !key || hosts.startsWith('#') || hosts.startsWith('@')) {
      return [];
    }
    if (hosts.startsWith('|1|')) {
      const [, , salt, hash] = hosts.split('|');
      return salt && hash ? [{ kind: 'hashed', salt: Buffer.from(salt, 'base64'), hash, key }] : [];
    }
    return [{ kind: 'plain', hostnames: hosts.split(','), key }];
  });
}

/** Names under which `node` may be recorded in known_hosts. */
export function knownHostNames(node: SshNodeConfig): string[] {
  return [
    ...new Set([node.host, `[${node.host}]:${node.port}`, `${node.host}:${node.port}`, node.name]),
  ];
}

function entryNamesNode(entry: KnownHostEntry, names: readonly string[]): boolean {
  if (entry.kind === 'plain') {
    return entry.hostnames.some((name) => names.includes(name));
  }
  return names.some((name) => createHmac('sha1', entry.salt).update(name).digest('base64') === entry.hash);
}

/** Host keys recorded for `node`, base64 encoded. */
export function knownKeysFor(node: SshNodeConfig, entries: readonly KnownHostEntry[]): Set<string> {
  const names = knownHostNames(node);
  return new Set(entries.filter((entry) => entryNamesNode(entry, names)).map((entry) => entry.key));
}

export function createHostKeyMatcher(
  node: SshNodeConfig,
  entries: readonly KnownHostEntry[],
): (key: Buffer) => boolean {
  const keys = knownKeysFor(node, entries);
  return (key) => keys.has(key.toString('base64'));
}

async function hostVerifierFor(node: SshNodeConfig): Promise<((key: Buffer) => boolean) | undefined> {
  if (!node.strictHostKeyChecking) {
    return undefined;
  }

  const file = node.knownHostsPath ?? DEFAULT_KNOWN_HOSTS_PATH;
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new CommandExecutionError(
      'config',
      `Cannot read known hosts file ${file}; set knownHostsPath or strictHostKeyChecking = false`,
      { cause: err },
    );
  }

  const entries = parseKnownHosts(raw);
  if (knownKeysFor(node, entries).size === 0) {
    throw new CommandExecutionError('config', `No host key for ${node.name} recorded in ${file}`);
  }
  return createHostKeyMatcher(node, entries);
}

export function passphraseVariable(node: SshNodeConfig): string {
  return `${PASSPHRASE_ENV_PREFIX}${node.name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

async function runCredentialCommand(node: SshNodeConfig, command: string): Promise<string> {
  const { stdout } = await execPromise(command, { maxBuffer: CREDENTIAL_OUTPUT_LIMIT });
  const password = stdout.trim();
  if (!password) {
    throw new CommandExecutionError('transport', `Credential command for ${node.name} printed no password`);
  }
  return password;
}

/** Turns a node's `auth` table into ssh2 connect options. */
export async function resolveCredentials(node: SshNodeConfig): Promise<Credentials> {
  const { auth } = node;
  switch (auth.type) {
    case 'ssh-key':
      return {
        privateKey: await fs.readFile(auth.privateKeyPath),
        passphrase: auth.passphrasePrompt ? process.env[passphraseVariable(node)] : undefined,
      };
    case 'ssh-agent': {
      const agent = auth.agentSocketPath ?? process.env.SSH_AUTH_SOCK;
      if (!agent) {
        throw new CommandExecutionError('transport', `SSH agent requested for ${node.name} but SSH_AUTH_SOCK is not set`);
      }
      return { agent };
    }
    case 'credential-command':
      return { password: await runCredentialCommand(node, auth.credentialCommand) };
    default: {
      const exhaustive: never = auth;
      throw new Error(`Unsupported auth type: ${String(exhaustive)}`);
    }
  }
}

/**
 * Connects and authenticates a session for `node`. The caller owns the
 * returned client and ends it when the run is over.
 */
export async function openSshSession(node: SshNodeConfig): Promise<Client> {
  const [credentials, hostVerifier] = await Promise.all([
    resolveCredentials(node).catch((err: unknown) => {
      throw enrichError(err, 'transport', node.name);
    }),
    hostVerifierFor(node).catch((err: unknown) => {
      throw enrichError(err, 'config', node.name);
    }),
  ]);

  const client = new Client();
  try {
    await new Promise<void>((resolve, reject) => {
      client.once('ready', () => resolve()).once('error', reject);
      client.connect({
        host: node.host,
        port: node.port,
        username: node.username,
        keepaliveInterval: node.keepAliveIntervalMs,
        readyTimeout: node.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
        hostVerifier,
        ...credentials,
      });
    });
  } catch (err) {
    client.end();
    throw enrichError(err, 'transport', node.name);
  }

  return client;
}
