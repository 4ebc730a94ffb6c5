import type { DeploySubmitter } from '../core/submitter.js';
import type { NodeTransport } from '../core/transport.js';
import type { DeployerClientOptions } from '../types/config.js';
import { DefaultDeployerClient, type DeployerClient } from './deployer-client.js';

export function createDeployerClient(
  transport: NodeTransport,
  submitter: DeploySubmitter,
  options: DeployerClientOptions,
): DeployerClient {
  return new DefaultDeployerClient(transport, submitter, options);
}
