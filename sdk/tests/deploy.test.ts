import { describe, expect, it } from 'vitest';

import { buildDeploy, submitDeploy } from '../src/bindings/deploy.js';
import type { DeploySubmitter } from '../src/core/submitter.js';
import { SubmissionError } from '../src/errors/index.js';
import type { DeployParams } from '../src/types/deploy.js';

const params: DeployParams = {
  nodeAddress: 'http://127.0.0.1:7777',
  chainName: 'test-net',
  secretKeyPath: '/keys/test-secret.pem',
  paymentAmount: 1_000n,
  session: { stateRootHash: 'abc123', packageHash: 'deadbeef' },
  entryPoint: 'set_fee',
  args: [{ name: 'fee', type: 'U128', value: '1' }],
};

describe('deploy builder', () => {
  it('carries the root hash the package was resolved under', () => {
    const request = buildDeploy(params);
    expect(request.stateRootHash).toBe('abc123');
    expect(request.packageHash).toBe('deadbeef');
    expect(request.args).toEqual(params.args);
    expect(request.args[0]).not.toBe(params.args[0]);
  });

  it('validates the deploy fields', () => {
    expect(() => buildDeploy({ ...params, paymentAmount: 0n })).toThrow('paymentAmount must be > 0');
    expect(() => buildDeploy({ ...params, chainName: '' })).toThrow('chainName is required');
    expect(() => buildDeploy({ ...params, session: { stateRootHash: 'abc123', packageHash: 'package-ab' } })).toThrow(
      'packageHash must be hex: package-ab',
    );
  });

  it('wraps submitter failures as submission errors', async () => {
    const submitter: DeploySubmitter = {
      submit: async () => {
        throw new Error('socket hang up');
      },
    };
    const submission = submitDeploy(submitter, buildDeploy(params));

    await expect(submission).rejects.toMatchObject({ code: 'SUBMISSION_ERROR', message: 'socket hang up' });
  });

  it('passes submission errors through untouched', async () => {
    const rejected = new SubmissionError('Deploy rejected by node: invalid deploy');
    const submitter: DeploySubmitter = {
      submit: async () => {
        throw rejected;
      },
    };

    await expect(submitDeploy(submitter, buildDeploy(params))).rejects.toBe(rejected);
  });
});
