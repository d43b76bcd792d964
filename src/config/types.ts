import type { ElevationStrategy } from '../executor/types.js';

export type AuthType = 'ssh-key' | 'ssh-agent' | 'credential-command';

export interface SshKeyAuthConfig {
  type: 'ssh-key';
  /** Absolute path to the private key used for authentication. */
  privateKeyPath: string;
  /** Read the key's passphrase from TESTBED_EXEC_PASSPHRASE_<NODE>. */
  passphrasePrompt?: boolean;
}

export interface SshAgentAuthConfig {
  type: 'ssh-agent';
  /** Optional explicit path to the SSH agent socket. Defaults to SSH_AUTH_SOCK. */
  agentSocketPath?: string;
}

export interface CredentialCommandAuthConfig {
  type: 'credential-command';
  /** Command printing the password on stdout (e.g. from a secret manager). */
  credentialCommand: string;
}

export type AuthConfig =
  | SshKeyAuthConfig
  | SshAgentAuthConfig
  | CredentialCommandAuthConfig;

interface NodeConfigBase {
  name: string;
  elevation: ElevationStrategy;
  /** Overrides the top-level `failOnNonZeroExit` for this node. */
  failOnNonZeroExit?: boolean;
}

export interface LocalNodeConfig extends NodeConfigBase {
  type: 'local';
  shellPath?: string;
  workingDirectory?: string;
}

export interface SshNodeConfig extends NodeConfigBase {
  type: 'ssh';
  host: string;
  port: number;
  username: string;
  auth: AuthConfig;
  knownHostsPath?: string;
  strictHostKeyChecking: boolean;
  keepAliveIntervalMs?: number;
  readyTimeoutMs?: number;
}

export type NodeConfig = LocalNodeConfig | SshNodeConfig;

export interface TestbedConfig {
  /** Root of the per-run log directories. */
  logDirectory: string;
  failOnNonZeroExit: boolean;
  nodes: NodeConfig[];
}

export interface LoadConfigOptions {
  /** Override config path; defaults to env or standard location. */
  configPath?: string;
  /** If true, missing config file resolves to an empty config instead of throwing. */
  allowMissing?: boolean;
}
