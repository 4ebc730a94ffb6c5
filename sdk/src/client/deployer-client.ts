import type { Logger } from 'pino';

import { buildDeploy, submitDeploy } from '../bindings/deploy.js';
import { resolvePackageHash } from '../bindings/entity.js';
import { createNodeBindings, splitQueryPath } from '../bindings/node.js';
import type { NodeBindings } from '../bindings/node.js';
import type { DeploySubmitter } from '../core/submitter.js';
import type { NodeTransport } from '../core/transport.js';
import { DeployerError } from '../errors/index.js';
import { ArgumentRegistry } from '../registry/arguments.js';
import type {
  AccountHash,
  ArgOverrides,
  ContractProfile,
  DeployRequest,
  DeployResult,
  ResolvedSession,
  StateRootHash,
  StoredValue,
  TypedArg,
} from '../types/deploy.js';
import type { DeployerClientOptions } from '../types/config.js';
import { assertAccountHash } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { RetryOptions } from '../utils/retry.js';

export interface DeployerClient {
  readonly nodeAddress: string;
  readonly contract: ContractProfile | undefined;
  getStateRootHash(): Promise<StateRootHash>;
  queryState(stateRootHash: StateRootHash, key: string, path: readonly string[]): Promise<StoredValue>;
  queryAccountPath(path: string): Promise<{ stateRootHash: StateRootHash; storedValue: StoredValue }>;
  resolveSession(): Promise<ResolvedSession>;
  buildArguments(entryPoint: string, overrides?: ArgOverrides): TypedArg[];
  prepareDeploy(entryPoint: string, overrides?: ArgOverrides): Promise<DeployRequest>;
  submitDeploy(request: DeployRequest): Promise<DeployResult>;
  execute(entryPoint: string, overrides?: ArgOverrides): Promise<DeployResult>;
}

const RESOLUTION_PENDING_CODES = new Set(['NOT_FOUND', 'MISSING_NAMED_KEY', 'EMPTY_RESULT']);

/** Failures the node's indexing lag can explain; everything else is fatal on first sight. */
export function isResolutionPending(error: unknown): boolean {
  return error instanceof DeployerError && RESOLUTION_PENDING_CODES.has(error.code);
}

export const DEFAULT_RESOLVE_RETRY: Omit<RetryOptions, 'retryableError' | 'onRetry'> = {
  attempts: 5,
  initialDelayMs: 1_000,
  maxDelayMs: 8_000,
  backoffMultiplier: 2,
  deadlineMs: 30_000,
};

export class DefaultDeployerClient implements DeployerClient {
  public readonly nodeAddress: string;
  public readonly contract: ContractProfile | undefined;

  private readonly node: NodeBindings;
  private readonly submitter: DeploySubmitter;
  private readonly accountHash: AccountHash | undefined;
  private readonly chainName: string | undefined;
  private readonly secretKeyPath: string | undefined;
  private readonly retry: DeployerClientOptions['retry'];
  private readonly logger: Logger;
  private readonly argumentRegistry: ArgumentRegistry | undefined;

  public constructor(transport: NodeTransport, submitter: DeploySubmitter, options: DeployerClientOptions) {
    this.node = createNodeBindings(transport);
    this.submitter = submitter;
    this.nodeAddress = options.nodeAddress;
    this.accountHash = options.accountHash;
    this.chainName = options.chainName;
    this.secretKeyPath = options.secretKeyPath;
    this.contract = options.contract;
    this.retry = options.retry;
    this.logger = options.logger ?? createLogger('deployer');
    this.argumentRegistry = options.contract ? new ArgumentRegistry(options.contract.entryPoints) : undefined;
  }

  public async getStateRootHash(): Promise<StateRootHash> {
    const stateRootHash = await this.node.getStateRootHash();
    this.logger.info({ stateRootHash }, 'retrieved state_root_hash');
    return stateRootHash;
  }

  public async queryState(stateRootHash: StateRootHash, key: string, path: readonly string[]): Promise<StoredValue> {
    return this.node.queryState(stateRootHash, key, path);
  }

  public async queryAccountPath(path: string): Promise<{ stateRootHash: StateRootHash; storedValue: StoredValue }> {
    const accountHash = this.requireAccountHash();
    const stateRootHash = await this.getStateRootHash();
    const storedValue = await this.node.queryState(stateRootHash, accountHash, splitQueryPath(path));
    return { stateRootHash, storedValue };
  }

  /**
   * Fetches a fresh root hash and resolves the contract's package under it,
   * repeating both steps with backoff while the named key is not visible yet.
   */
  public async resolveSession(): Promise<ResolvedSession> {
    const contract = this.requireContract();
    const accountHash = this.requireAccountHash();

    return withRetry(
      'resolveSession',
      async () => {
        const stateRootHash = await this.getStateRootHash();
        const storedValue = await this.node.queryState(stateRootHash, accountHash, [contract.namedKey]);
        const packageHash = resolvePackageHash(storedValue, contract.namedKey);
        this.logger.info({ packageHash, namedKey: contract.namedKey }, 'retrieved package_hash');
        return { stateRootHash, packageHash };
      },
      {
        ...DEFAULT_RESOLVE_RETRY,
        ...this.retry,
        retryableError: isResolutionPending,
        onRetry: ({ attempt, delayMs, error }) => {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn({ attempt, delayMs, reason }, 'package hash not resolvable yet, retrying');
        },
      },
    );
  }

  public buildArguments(entryPoint: string, overrides?: ArgOverrides): TypedArg[] {
    return this.requireArguments().buildArguments(entryPoint, overrides);
  }

  public async prepareDeploy(entryPoint: string, overrides?: ArgOverrides): Promise<DeployRequest> {
    const contract = this.requireContract();
    const chainName = this.requireSetting(this.chainName, 'chainName', 'CHAIN_NAME');
    const secretKeyPath = this.requireSetting(this.secretKeyPath, 'secretKeyPath', 'SECRET_KEY_PATH');

    const session = await this.resolveSession();
    const args = this.buildArguments(entryPoint, overrides);
    return buildDeploy({
      nodeAddress: this.nodeAddress,
      chainName,
      secretKeyPath,
      paymentAmount: contract.paymentAmount,
      session,
      entryPoint,
      args,
    });
  }

  public async submitDeploy(request: DeployRequest): Promise<DeployResult> {
    const result = await submitDeploy(this.submitter, request);
    this.logger.info(
      { deployHash: result.deployHash, entryPoint: request.entryPoint, packageHash: request.packageHash },
      'deploy submitted',
    );
    return result;
  }

  public async execute(entryPoint: string, overrides?: ArgOverrides): Promise<DeployResult> {
    const request = await this.prepareDeploy(entryPoint, overrides);
    return this.submitDeploy(request);
  }

  private requireContract(): ContractProfile {
    if (!this.contract) {
      throw new DeployerError('CONFIG_ERROR', 'No contract profile configured. Provide options.contract.');
    }
    return this.contract;
  }

  private requireArguments(): ArgumentRegistry {
    if (!this.argumentRegistry) {
      throw new DeployerError('CONFIG_ERROR', 'No contract profile configured. Provide options.contract.');
    }
    return this.argumentRegistry;
  }

  private requireAccountHash(): AccountHash {
    return assertAccountHash(this.requireSetting(this.accountHash, 'accountHash', 'ACCOUNT_HASH'), 'accountHash');
  }

  private requireSetting<T extends string>(value: T | undefined, field: string, env: string): T {
    if (!value) {
      throw new DeployerError('CONFIG_ERROR', `Missing ${field}. Set ${env} or pass options.${field}.`);
    }
    return value;
  }
}
