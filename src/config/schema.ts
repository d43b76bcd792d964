import { z } from 'zod';
import type { TestbedConfig } from './types.js';

export const DEFAULT_LOG_DIRECTORY = './logs';

const sshKeyAuthSchema = z.object({
  type: z.literal('ssh-key'),
  privateKeyPath: z
    .string()
    .min(1, 'ssh-key auth requires privateKeyPath'),
  passphrasePrompt: z.boolean().optional(),
});

const sshAgentAuthSchema = z.object({
  type: z.literal('ssh-agent'),
  agentSocketPath: z.string().min(1).optional(),
});

const credentialCommandAuthSchema = z.object({
  type: z.literal('credential-command'),
  credentialCommand: z
    .string()
    .min(1, 'credential-command auth requires credentialCommand'),
});

const authSchema = z.discriminatedUnion('type', [
  sshKeyAuthSchema,
  sshAgentAuthSchema,
  credentialCommandAuthSchema,
]);

const elevationSchema = z.enum(['sudo', 'su'], {
  errorMap: () => ({ message: "elevation must be 'sudo' or 'su'" }),
});

const nodeBaseShape = {
  name: z
    .string()
    .min(1, 'name is required')
    .regex(/^[A-Za-z0-9._-]+$/, 'name may only contain letters, digits, ".", "_" and "-"'),
  elevation: elevationSchema.optional(),
  failOnNonZeroExit: z.boolean().optional(),
};

const localNodeSchema = z
  .object({
    ...nodeBaseShape,
    type: z.literal('local'),
    shellPath: z.string().min(1).optional(),
    workingDirectory: z.string().min(1).optional(),
  })
  .strict();

const sshNodeSchema = z
  .object({
    ...nodeBaseShape,
    type: z.literal('ssh'),
    host: z.string().min(1, 'host is required'),
    port: z
      .number({ invalid_type_error: 'port must be a number' })
      .int('port must be an integer')
      .min(1, 'port must be >= 1')
      .max(65535, 'port must be <= 65535')
      .optional(),
    username: z.string().min(1, 'username is required'),
    auth: authSchema,
    knownHostsPath: z.string().min(1).optional(),
    strictHostKeyChecking: z.boolean().optional(),
    keepAliveIntervalMs: z
      .number({ invalid_type_error: 'keepAliveIntervalMs must be a number' })
      .int('keepAliveIntervalMs must be an integer')
      .positive('keepAliveIntervalMs must be positive')
      .optional(),
    readyTimeoutMs: z
      .number({ invalid_type_error: 'readyTimeoutMs must be a number' })
      .int('readyTimeoutMs must be an integer')
      .positive('readyTimeoutMs must be positive')
      .optional(),
  })
  .strict();

const nodeSchema = z.discriminatedUnion('type', [localNodeSchema, sshNodeSchema]);

export const testbedConfigSchema = z
  .object({
    logDirectory: z.string().min(1).optional(),
    failOnNonZeroExit: z.boolean().optional(),
    nodes: z
      .array(nodeSchema)
      .nonempty('At least one node entry is required in config'),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.nodes.forEach((node, index) => {
      if (seen.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'name'],
          message: `duplicate node name '${node.name}'`,
        });
      }
      seen.add(node.name);
    });
  });

export function coerceConfig(input: unknown): TestbedConfig {
  const parseResult = testbedConfigSchema.safeParse(input);

  if (!parseResult.success) {
    const formatted = parseResult.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid testbed-exec configuration:\n${formatted}`);
  }

  const normalized = parseResult.data;

  return {
    logDirectory: normalized.logDirectory ?? DEFAULT_LOG_DIRECTORY,
    failOnNonZeroExit: normalized.failOnNonZeroExit ?? false,
    nodes: normalized.nodes.map((node) =>
      node.type === 'ssh'
        ? {
            ...node,
            elevation: node.elevation ?? 'sudo',
            port: node.port ?? 22,
            strictHostKeyChecking: node.strictHostKeyChecking ?? true,
          }
        : {
            ...node,
            elevation: node.elevation ?? 'sudo',
          },
    ),
  } satisfies TestbedConfig;
}
