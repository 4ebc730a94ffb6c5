export { createDeployerClient } from './client/create-client.js';
export { DefaultDeployerClient, DEFAULT_RESOLVE_RETRY, isResolutionPending } from './client/deployer-client.js';
export type { DeployerClient } from './client/deployer-client.js';
export { buildDeploy, submitDeploy } from './bindings/deploy.js';
export { ENTITY_KINDS, resolvePackageHash } from './bindings/entity.js';
export { createNodeBindings, splitQueryPath } from './bindings/node.js';
export type { NodeBindings } from './bindings/node.js';
export { loadConfig } from './config/env.js';
export type { ConfigOverrides } from './config/env.js';
export { DEFAULT_REGISTRY_PATH, loadContractRegistry, parseContractRegistry } from './config/registry.js';
export { HttpJsonRpcTransport, rpcUrl } from './core/http-transport.js';
export { ClientBinarySubmitter, parseDeployHash, putDeployArguments, runCommand } from './core/submitter.js';
export type { CommandOutput, CommandRunner, DeploySubmitter } from './core/submitter.js';
export { JsonRpcResponseError } from './core/transport.js';
export type { JsonRpcParams, NodeTransport } from './core/transport.js';
export * from './errors/index.js';
export { ArgumentRegistry } from './registry/arguments.js';
export { ContractRegistry } from './registry/contracts.js';
export type {
  AccountHash,
  ArgOverrides,
  ArgValue,
  CLScalarTag,
  CLType,
  ContractProfile,
  DeployParams,
  DeployRequest,
  DeployResult,
  EntryPointSpec,
  PackageHash,
  ResolvedSession,
  StateRootHash,
  StoredValue,
  TypedArg,
} from './types/deploy.js';
export { CL_SCALAR_TAGS } from './types/deploy.js';
export type { DeployerClientOptions, DeployerConfig } from './types/config.js';
export { checkArgValue, coerceArgValue, formatCLType } from './utils/cl-type.js';
export { withRetry } from './utils/retry.js';
export type { RetryEvent, RetryOptions } from './utils/retry.js';
