import type { Logger } from 'pino';

import type { RetryOptions } from '../utils/retry.js';
import type { AccountHash, ContractProfile } from './deploy.js';

export interface DeployerConfig {
  nodeAddress: string;
  accountHash?: AccountHash;
  chainName?: string;
  secretKeyPath?: string;
  clientCommand: readonly string[];
  registryPath?: string;
  timeoutMs: number;
  resolve: {
    attempts: number;
    deadlineMs: number;
  };
}

export interface DeployerClientOptions {
  nodeAddress: string;
  accountHash?: AccountHash;
  chainName?: string;
  secretKeyPath?: string;
  /** Needed by the deploy operations; read-only operations work without it. */
  contract?: ContractProfile;
  retry?: Partial<Omit<RetryOptions, 'retryableError' | 'onRetry'>>;
  logger?: Logger;
}
