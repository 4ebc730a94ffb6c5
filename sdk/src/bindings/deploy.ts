import { DeployerError, toDeployerError } from '../errors/index.js';
import type { DeploySubmitter } from '../core/submitter.js';
import type { DeployParams, DeployRequest, DeployResult } from '../types/deploy.js';
import { isHexString } from '../utils/hash.js';

export function buildDeploy(params: DeployParams): DeployRequest {
  if (!params.chainName) {
    throw new DeployerError('INVALID_INPUT', 'chainName is required');
  }
  if (!params.secretKeyPath) {
    throw new DeployerError('INVALID_INPUT', 'secretKeyPath is required');
  }
  if (!params.entryPoint) {
    throw new DeployerError('INVALID_INPUT', 'entryPoint is required');
  }
  if (params.paymentAmount <= 0n) {
    throw new DeployerError('INVALID_INPUT', 'paymentAmount must be > 0');
  }
  if (!params.session.packageHash || !isHexString(params.session.packageHash)) {
    throw new DeployerError('INVALID_INPUT', `packageHash must be hex: ${params.session.packageHash}`);
  }

  return {
    nodeAddress: params.nodeAddress,
    chainName: params.chainName,
    secretKeyPath: params.secretKeyPath,
    paymentAmount: params.paymentAmount,
    stateRootHash: params.session.stateRootHash,
    packageHash: params.session.packageHash,
    entryPoint: params.entryPoint,
    args: params.args.map((arg) => ({ ...arg })),
  };
}

/** Single attempt; a rejected deploy is never resubmitted. */
export async function submitDeploy(submitter: DeploySubmitter, request: DeployRequest): Promise<DeployResult> {
  try {
    const { deployHash } = await submitter.submit(request);
    return { deployHash, request };
  } catch (error) {
    throw toDeployerError(error, 'SUBMISSION_ERROR');
  }
}
