import { z } from 'zod';

import { DeployerError } from '../errors/index.js';
import type { AccountHash } from '../types/deploy.js';
import type { DeployerConfig } from '../types/config.js';
import { isAccountHash } from '../utils/hash.js';

export interface ConfigOverrides {
  nodeAddress?: string;
  accountHash?: string;
  chainName?: string;
  secretKeyPath?: string;
  clientCommand?: string;
  registryPath?: string;
  timeoutMs?: number;
  resolveAttempts?: number;
  resolveDeadlineMs?: number;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const configSchema = z.object({
  nodeAddress: z.preprocess(
    blankToUndefined,
    z.string({ required_error: 'NODE_ADDRESS or --node-address is required' }).url(),
  ),
  accountHash: z.preprocess(
    blankToUndefined,
    z
      .custom<AccountHash>((value) => typeof value === 'string' && isAccountHash(value), {
        message: 'expected account-hash-<64 hex characters>',
      })
      .optional(),
  ),
  chainName: optionalText,
  secretKeyPath: optionalText,
  clientCommand: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default('casper-client')
      .transform((command) => command.trim().split(/\s+/)),
  ),
  registryPath: optionalText,
  timeoutMs: positiveInt(10_000),
  resolveAttempts: positiveInt(5),
  resolveDeadlineMs: positiveInt(30_000),
});

/**
 * Builds the explicit client configuration. Flags win over environment
 * variables; nothing here carries a default endpoint, account or key.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): DeployerConfig {
  const parsed = configSchema.safeParse({
    nodeAddress: overrides.nodeAddress ?? env.NODE_ADDRESS,
    accountHash: overrides.accountHash ?? env.ACCOUNT_HASH,
    chainName: overrides.chainName ?? env.CHAIN_NAME,
    secretKeyPath: overrides.secretKeyPath ?? env.SECRET_KEY_PATH,
    clientCommand: overrides.clientCommand ?? env.CLIENT_COMMAND,
    registryPath: overrides.registryPath ?? env.DEPLOY_REGISTRY,
    timeoutMs: overrides.timeoutMs ?? env.RPC_TIMEOUT_MS,
    resolveAttempts: overrides.resolveAttempts ?? env.RESOLVE_ATTEMPTS,
    resolveDeadlineMs: overrides.resolveDeadlineMs ?? env.RESOLVE_DEADLINE_MS,
  });
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new DeployerError('CONFIG_ERROR', `Invalid configuration: ${summary}`, parsed.error.issues);
  }

  const config = parsed.data;
  return {
    nodeAddress: config.nodeAddress,
    accountHash: config.accountHash,
    chainName: config.chainName,
    secretKeyPath: config.secretKeyPath,
    clientCommand: config.clientCommand,
    registryPath: config.registryPath,
    timeoutMs: config.timeoutMs,
    resolve: {
      attempts: config.resolveAttempts,
      deadlineMs: config.resolveDeadlineMs,
    },
  };
}
