import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config/env.js';
import { DeployerError } from '../src/errors/index.js';
import { TEST_ACCOUNT } from './helpers/mock-transport.js';

describe('configuration', () => {
  it('applies defaults to everything but the node address', () => {
    expect(loadConfig({ NODE_ADDRESS: 'http://127.0.0.1:7777' })).toEqual({
      nodeAddress: 'http://127.0.0.1:7777',
      accountHash: undefined,
      chainName: undefined,
      secretKeyPath: undefined,
      clientCommand: ['casper-client'],
      registryPath: undefined,
      timeoutMs: 10_000,
      resolve: { attempts: 5, deadlineMs: 30_000 },
    });
  });

  it('reads the environment and lets overrides win', () => {
    const config = loadConfig(
      {
        NODE_ADDRESS: 'http://127.0.0.1:7777',
        ACCOUNT_HASH: TEST_ACCOUNT,
        CHAIN_NAME: 'test-net',
        SECRET_KEY_PATH: '/keys/secret_key.pem',
        CLIENT_COMMAND: 'cargo run --release --',
        RPC_TIMEOUT_MS: '2500',
        RESOLVE_ATTEMPTS: '2',
      },
      { chainName: 'other-net', resolveDeadlineMs: 500 },
    );

    expect(config.accountHash).toBe(TEST_ACCOUNT);
    expect(config.chainName).toBe('other-net');
    expect(config.clientCommand).toEqual(['cargo', 'run', '--release', '--']);
    expect(config.timeoutMs).toBe(2500);
    expect(config.resolve).toEqual({ attempts: 2, deadlineMs: 500 });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ NODE_ADDRESS: 'http://127.0.0.1:7777', CHAIN_NAME: '  ', RESOLVE_ATTEMPTS: '' });
    expect(config.chainName).toBeUndefined();
    expect(config.resolve.attempts).toBe(5);
  });

  it('requires a node address', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: nodeAddress: NODE_ADDRESS or --node-address is required',
    );
  });

  it('rejects malformed values as configuration errors', () => {
    let caught: unknown;
    try {
      loadConfig({ NODE_ADDRESS: 'http://127.0.0.1:7777', ACCOUNT_HASH: 'account-hash-xyz', RESOLVE_ATTEMPTS: '0' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DeployerError);
    expect(caught).toMatchObject({ code: 'CONFIG_ERROR' });
    expect(String(caught)).toContain('accountHash: expected account-hash-<64 hex characters>');
    expect(String(caught)).toContain('resolveAttempts:');
  });
});
