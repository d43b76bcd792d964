import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  CONFIG_ENV_VAR,
  ConfigLoadError,
  loadConfig,
} from '../src/config/loader.js';

const originalEnvPath = process.env[CONFIG_ENV_VAR];
let tempDir: string;
let configPath: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-exec-test-'));
  configPath = path.join(tempDir, 'config.toml');
  process.env[CONFIG_ENV_VAR] = configPath;
});

afterEach(async () => {
  if (originalEnvPath === undefined) {
    delete process.env[CONFIG_ENV_VAR];
  } else {
    process.env[CONFIG_ENV_VAR] = originalEnvPath;
  }
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('loads and normalizes a valid configuration file', async () => {
    await fs.writeFile(
      configPath,
      `logDirectory = "runs"\n` +
        `[[nodes]]\n` +
        `name = "validator-1"\n` +
        `type = "ssh"\n` +
        `host = "10.0.0.2"\n` +
        `username = "testbed"\n` +
        `[nodes.auth]\n` +
        `type = "ssh-agent"\n` +
        `[[nodes]]\n` +
        `name = "controller"\n` +
        `type = "local"\n` +
        `elevation = "su"\n`,
      'utf8',
    );

    const config = await loadConfig();

    expect(config.logDirectory).toBe(path.join(tempDir, 'runs'));
    expect(config.failOnNonZeroExit).toBe(false);
    expect(config.nodes).toHaveLength(2);
    expect(config.nodes[0]).toMatchObject({
      name: 'validator-1',
      type: 'ssh',
      host: '10.0.0.2',
      username: 'testbed',
      auth: { type: 'ssh-agent' },
      port: 22,
      elevation: 'sudo',
      strictHostKeyChecking: true,
    });
    expect(config.nodes[1]).toEqual({ name: 'controller', type: 'local', elevation: 'su' });
  });

  it('prefers an explicit path over the environment', async () => {
    const explicitPath = path.join(tempDir, 'explicit.toml');
    await fs.writeFile(
      explicitPath,
      `failOnNonZeroExit = true\n[[nodes]]\nname = "local"\ntype = "local"\n`,
      'utf8',
    );

    const config = await loadConfig({ configPath: explicitPath });

    expect(config.failOnNonZeroExit).toBe(true);
    expect(config.logDirectory).toBe(path.join(tempDir, 'logs'));
  });

  it('throws ConfigLoadError when file is missing', async () => {
    await fs.rm(configPath, { force: true });

    await expect(loadConfig()).rejects.toBeInstanceOf(ConfigLoadError);
  });

  it('falls back to a local-only testbed for a missing file when allowed', async () => {
    await expect(loadConfig({ allowMissing: true })).resolves.toEqual({
      logDirectory: path.resolve('logs'),
      failOnNonZeroExit: false,
      nodes: [{ name: 'local', type: 'local', elevation: 'sudo' }],
    });
  });

  it('tags a missing file with its load stage', async () => {
    const error = await loadConfig().catch((err: unknown) => err);

    expect(error).toMatchObject({ stage: 'missing', configPath });
  });

  it('verifies host keys unless a node opts out', async () => {
    await fs.writeFile(
      configPath,
      `[[nodes]]\nname = "a"\ntype = "ssh"\nhost = "10.0.0.2"\nusername = "testbed"\n` +
        `[nodes.auth]\ntype = "ssh-agent"\n` +
        `[[nodes]]\nname = "b"\ntype = "ssh"\nhost = "10.0.0.3"\nusername = "testbed"\n` +
        `strictHostKeyChecking = false\n[nodes.auth]\ntype = "ssh-agent"\n`,
      'utf8',
    );

    const config = await loadConfig();

    expect(config.nodes.map((node) => node.type === 'ssh' && node.strictHostKeyChecking)).toEqual([true, false]);
  });

  it('resolves node paths against the configuration file', async () => {
    await fs.writeFile(
      configPath,
      `[[nodes]]\nname = "a"\ntype = "ssh"\nhost = "10.0.0.2"\nusername = "testbed"\n` +
        `knownHostsPath = "keys/known_hosts"\n` +
        `[nodes.auth]\ntype = "ssh-key"\nprivateKeyPath = "~/.ssh/id_test"\n` +
        `[[nodes]]\nname = "b"\ntype = "local"\nworkingDirectory = "work"\n`,
      'utf8',
    );

    const config = await loadConfig();

    expect(config.nodes[0]).toMatchObject({
      knownHostsPath: path.join(tempDir, 'keys', 'known_hosts'),
      auth: { type: 'ssh-key', privateKeyPath: path.join(os.homedir(), '.ssh', 'id_test') },
    });
    expect(config.nodes[1]).toMatchObject({ workingDirectory: path.join(tempDir, 'work') });
  });

  it('surfaces validation errors with helpful message', async () => {
    await fs.writeFile(
      configPath,
      `[[nodes]]\n` +
        `name = "broken"\n` +
        `type = "ssh"\n` +
        `host = "example.com"\n` +
        `[nodes.auth]\n` +
        `type = "ssh-key"\n`,
      'utf8',
    );

    await expect(loadConfig()).rejects.toThrow(/Configuration validation error/);
  });

  it('rejects unknown elevation strategies', async () => {
    await fs.writeFile(configPath, `[[nodes]]\nname = "a"\ntype = "local"\nelevation = "doas"\n`, 'utf8');

    const error = await loadConfig().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigLoadError);
    const cause = error instanceof ConfigLoadError ? error.cause : undefined;
    expect(String(cause)).toContain("nodes.0.elevation: elevation must be 'sudo' or 'su'");
  });

  it('rejects duplicate node names', async () => {
    await fs.writeFile(
      configPath,
      `[[nodes]]\nname = "a"\ntype = "local"\n[[nodes]]\nname = "a"\ntype = "local"\n`,
      'utf8',
    );

    const error = await loadConfig().catch((err: unknown) => err);

    const cause = error instanceof ConfigLoadError ? error.cause : undefined;
    expect(String(cause)).toContain("nodes.1.name: duplicate node name 'a'");
  });
});
