import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { parse as parseToml } from 'toml';

import { coerceConfig } from './schema.js';
import type { AuthConfig, LoadConfigOptions, NodeConfig, TestbedConfig } from './types.js';

export const CONFIG_ENV_VAR = 'TESTBED_EXEC_CONFIG';
export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'testbed-exec', 'config.toml');

/** Testbed used when no file exists and `allowMissing` is set. */
export const LOCAL_ONLY_TESTBED = { nodes: [{ name: 'local', type: 'local' }] } as const;

export type ConfigLoadStage = 'missing' | 'read' | 'parse' | 'validate';

export class ConfigLoadError extends Error {
  constructor(
    readonly configPath: string,
    readonly stage: ConfigLoadStage,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigLoadError';
  }
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const chosen = [options.configPath, process.env[CONFIG_ENV_VAR]]
    .map((candidate) => candidate?.trim())
    .find((candidate): candidate is string => Boolean(candidate));
  return chosen ? path.resolve(chosen) : DEFAULT_CONFIG_PATH;
}

/** `~/` is the home directory; other relative paths start at `baseDir`. */
export function resolveConfigRelativePath(value: string, baseDir: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return path.resolve(baseDir, value);
}

function resolveAuthPaths(auth: AuthConfig, baseDir: string): AuthConfig {
  if (auth.type !== 'ssh-key') {
    return auth;
  }
  return { ...auth, privateKeyPath: resolveConfigRelativePath(auth.privateKeyPath, baseDir) };
}

function resolveNodePaths(node: NodeConfig, baseDir: string): NodeConfig {
  if (node.type === 'local') {
    return node.workingDirectory === undefined
      ? node
      : { ...node, workingDirectory: resolveConfigRelativePath(node.workingDirectory, baseDir) };
  }
  return {
    ...node,
    auth: resolveAuthPaths(node.auth, baseDir),
    ...(node.knownHostsPath === undefined
      ? {}
      : { knownHostsPath: resolveConfigRelativePath(node.knownHostsPath, baseDir) }),
  };
}

function withResolvedPaths(config: TestbedConfig, baseDir: string): TestbedConfig {
  return {
    ...config,
    logDirectory: resolveConfigRelativePath(config.logDirectory, baseDir),
    nodes: config.nodes.map((node) => resolveNodePaths(node, baseDir)),
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readConfigSource(configPath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw new ConfigLoadError(configPath, 'read', `Failed to read configuration file at ${configPath}`, {
      cause: err,
    });
  }
}

/**
 * Loads the testbed description. Paths inside the file (log directory, keys,
 * known_hosts, working directories) are relative to the file itself.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TestbedConfig> {
  const configPath = resolveConfigPath(options);
  const source = await readConfigSource(configPath);

  if (source === undefined) {
    if (!options.allowMissing) {
      throw new ConfigLoadError(
        configPath,
        'missing',
        `Configuration file not found. Expected at ${configPath}. Set ${CONFIG_ENV_VAR} to override the path.`,
      );
    }
    return withResolvedPaths(coerceConfig(LOCAL_ONLY_TESTBED), process.cwd());
  }

  let document: unknown;
  try {
    document = parseToml(source);
  } catch (err) {
    throw new ConfigLoadError(configPath, 'parse', `Failed to parse TOML in configuration file at ${configPath}`, {
      cause: err,
    });
  }

  let config: TestbedConfig;
  try {
    config = coerceConfig(document);
  } catch (err) {
    throw new ConfigLoadError(configPath, 'validate', `Configuration validation error for ${configPath}`, {
      cause: err,
    });
  }

  return withResolvedPaths(config, path.dirname(configPath));
}
