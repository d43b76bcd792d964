import { createHmac } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import type { SshNodeConfig } from '../src/config/types.js';
import {
  createHostKeyMatcher,
  knownHostNames,
  openSshSession,
  parseKnownHosts,
  passphraseVariable,
  resolveCredentials,
} from '../src/session/ssh-session.js';

const node: SshNodeConfig = {
  name: 'validator-1',
  type: 'ssh',
  host: '10.0.0.2',
  port: 2222,
  username: 'testbed',
  auth: { type: 'ssh-agent', agentSocketPath: '/tmp/agent.sock' },
  elevation: 'sudo',
  strictHostKeyChecking: true,
};

const hostKey = Buffer.from('test-host-key');
const otherKey = Buffer.from('other-host-key');
const salt = Buffer.from('test-salt');

function hashedName(name: string): string {
  return `|1|${salt.toString('base64')}|${createHmac('sha1', salt).update(name).digest('base64')}`;
}

describe('parseKnownHosts', () => {
  it('reads plain and hashed entries and skips comments and markers', () => {
    const entries = parseKnownHosts(
      [
        '# comment',
        '',
        `10.0.0.2,validator-1 ssh-ed25519 ${hostKey.toString('base64')}`,
        `@cert-authority *.example ssh-ed25519 ${otherKey.toString('base64')}`,
        `${hashedName('10.0.0.9')} ssh-ed25519 ${otherKey.toString('base64')}`,
        'incomplete-line ssh-ed25519',
      ].join('\n'),
    );

    expect(entries).toEqual([
      { kind: 'plain', hostnames: ['10.0.0.2', 'validator-1'], key: hostKey.toString('base64') },
      {
        kind: 'hashed',
        salt,
        hash: createHmac('sha1', salt).update('10.0.0.9').digest('base64'),
        key: otherKey.toString('base64'),
      },
    ]);
  });
});

describe('createHostKeyMatcher', () => {
  it('lists the names a node can appear under', () => {
    expect(knownHostNames(node)).toEqual(['10.0.0.2', '[10.0.0.2]:2222', '10.0.0.2:2222', 'validator-1']);
  });

  it('accepts the recorded key for a bracketed host and port entry', () => {
    const matches = createHostKeyMatcher(
      node,
      parseKnownHosts(`[10.0.0.2]:2222 ssh-ed25519 ${hostKey.toString('base64')}`),
    );

    expect(matches(hostKey)).toBe(true);
    expect(matches(otherKey)).toBe(false);
  });

  it('accepts a key recorded under a hashed host name', () => {
    const matches = createHostKeyMatcher(
      node,
      parseKnownHosts(`${hashedName('[10.0.0.2]:2222')} ssh-ed25519 ${hostKey.toString('base64')}`),
    );

    expect(matches(hostKey)).toBe(true);
  });

  it('rejects a key recorded for another host', () => {
    const matches = createHostKeyMatcher(
      node,
      parseKnownHosts(`10.0.0.3 ssh-ed25519 ${hostKey.toString('base64')}`),
    );

    expect(matches(hostKey)).toBe(false);
  });
});

describe('resolveCredentials', () => {
  const originalPassphrase = process.env[passphraseVariable(node)];
  let tempDir: string | undefined;

  afterEach(async () => {
    if (originalPassphrase === undefined) {
      delete process.env[passphraseVariable(node)];
    } else {
      process.env[passphraseVariable(node)] = originalPassphrase;
    }
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('uses the configured agent socket', async () => {
    await expect(resolveCredentials(node)).resolves.toEqual({ agent: '/tmp/agent.sock' });
  });

  it('reads the private key and the passphrase variable named after the node', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-exec-key-'));
    const keyPath = path.join(tempDir, 'id_test');
    await fs.writeFile(keyPath, 'test-private-key');
    process.env.TESTBED_EXEC_PASSPHRASE_VALIDATOR_1 = 'test-secret';

    const credentials = await resolveCredentials({
      ...node,
      auth: { type: 'ssh-key', privateKeyPath: keyPath, passphrasePrompt: true },
    });

    expect(passphraseVariable(node)).toBe('TESTBED_EXEC_PASSPHRASE_VALIDATOR_1');
    expect(credentials.passphrase).toBe('test-secret');
    expect(String(credentials.privateKey)).toBe('test-private-key');
  });

  it('takes the password from a credential command', async () => {
    await expect(
      resolveCredentials({ ...node, auth: { type: 'credential-command', credentialCommand: 'echo test-secret' } }),
    ).resolves.toEqual({ password: 'test-secret' });
  });
});

describe('openSshSession', () => {
  it('refuses to connect when known_hosts has no key for the node', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-exec-hosts-'));
    const knownHostsPath = path.join(dir, 'known_hosts');
    await fs.writeFile(knownHostsPath, `10.0.0.3 ssh-ed25519 ${hostKey.toString('base64')}\n`);

    try {
      await expect(openSshSession({ ...node, knownHostsPath })).rejects.toMatchObject({
        kind: 'config',
        message: `No host key for validator-1 recorded in ${knownHostsPath}`,
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
