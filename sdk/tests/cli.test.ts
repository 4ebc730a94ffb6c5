import { describe, expect, it } from 'vitest';

import { runCli } from '../src/cli/index.js';
import type { CliDependencies } from '../src/cli/index.js';
import { loadContractRegistry } from '../src/config/registry.js';
import { ClientBinarySubmitter } from '../src/core/submitter.js';
import {
  MockSubmitter,
  MockTransport,
  TEST_ACCOUNT,
  addressableEntity,
  silentLogger,
  stateRoot,
} from './helpers/mock-transport.js';

const ENV = {
  NODE_ADDRESS: 'http://127.0.0.1:7777',
  ACCOUNT_HASH: TEST_ACCOUNT,
  CHAIN_NAME: 'test-net',
  SECRET_KEY_PATH: '/keys/secret_key.pem',
  RESOLVE_ATTEMPTS: '1',
};

function harness(env: NodeJS.ProcessEnv = ENV, options: { realSubmitter?: boolean } = {}) {
  const transport = new MockTransport()
    .on('chain_get_state_root_hash', stateRoot('abc123'))
    .on('query_global_state', addressableEntity('deadbeef'));
  const submitter = new MockSubmitter();
  const stdout: string[] = [];
  const stderr: string[] = [];
  const deps: CliDependencies = {
    env,
    createTransport: () => transport,
    createSubmitter: (config, logger) =>
      options.realSubmitter ? new ClientBinarySubmitter({ command: config.clientCommand, logger }) : submitter,
    loadRegistry: (path) => loadContractRegistry(path),
    logger: silentLogger,
    stdout: (line) => {
      stdout.push(line);
    },
    stderr: (line) => {
      stderr.push(line);
    },
  };
  return { transport, submitter, stdout, stderr, run: (...argv: string[]) => runCli(argv, deps) };
}

describe('deploy-runner cli', () => {
  it('executes an entry point and prints the deploy hash', async () => {
    const { run, stdout, submitter } = harness();

    await expect(run('execute', 'gateway', 'init')).resolves.toBe(0);

    expect(stdout).toEqual(['1'.padStart(64, '0')]);
    expect(submitter.requests).toHaveLength(1);
    expect(submitter.requests[0]).toMatchObject({
      chainName: 'test-net',
      stateRootHash: 'abc123',
      packageHash: 'deadbeef',
      entryPoint: 'init',
      args: [],
      paymentAmount: 1_000_000n,
    });
  });

  it('reports an unknown entry point after resolving and submits nothing', async () => {
    const { run, stderr, transport, submitter } = harness();

    await expect(run('execute', 'gateway', 'bogus_entry')).resolves.toBe(1);

    expect(stderr).toHaveLength(1);
    expect(stderr[0]?.startsWith("error: Invalid entry point 'bogus_entry'")).toBe(true);
    expect(transport.requests).toHaveLength(2);
    expect(submitter.requests).toHaveLength(0);
  });

  it('prints usage when the entry point is missing', async () => {
    const { run, stderr, transport } = harness();

    await expect(run('execute', 'gateway')).resolves.toBe(1);

    expect(stderr).toEqual([
      'No entry point provided. Usage: deploy-runner execute <contract> <entry-point> [--arg name=value ...] [--dry-run]',
    ]);
    expect(transport.requests).toHaveLength(0);
  });

  it('rejects unknown contracts', async () => {
    const { run, stderr } = harness();

    await expect(run('execute', 'nowhere', 'init')).resolves.toBe(1);

    expect(stderr).toEqual([
      "error: Unknown contract 'nowhere' (known: asset_bridge, asset_forwarder, batch_handler, gateway)",
    ]);
  });

  it('applies argument overrides', async () => {
    const { run, submitter } = harness();

    await expect(run('execute', 'gateway', 'set_bridge_fees', '--arg', 'new_fees=42')).resolves.toBe(0);

    expect(submitter.requests[0]?.args).toEqual([{ name: 'new_fees', type: 'U128', value: '42' }]);
  });

  it('prints the prepared deploy on a dry run', async () => {
    const { run, stdout, submitter } = harness(ENV, { realSubmitter: true });

    await expect(run('execute', 'batch_handler', 'init', '--dry-run')).resolves.toBe(0);

    expect(submitter.requests).toHaveLength(0);
    expect(stdout).toHaveLength(1);
    const printed: unknown = JSON.parse(stdout[0] ?? '');
    expect(printed).toMatchObject({
      chain_name: 'test-net',
      payment_amount: '1000000',
      state_root_hash: 'abc123',
      package_hash: 'deadbeef',
      entry_point: 'init',
      args: [],
    });
    expect(printed).toHaveProperty('command.0', 'casper-client');
    expect(printed).toHaveProperty('command.1', 'put-deploy');
  });

  it('prints the state root hash', async () => {
    const { run, stdout } = harness();

    await expect(run('state-root-hash')).resolves.toBe(0);
    expect(stdout).toEqual(['abc123']);
  });

  it('prints the stored value under an account path', async () => {
    const { run, stdout, transport } = harness();

    await expect(run('query', 'contract_hash_gateway')).resolves.toBe(0);

    expect(transport.requests[1]?.params).toEqual({
      state_identifier: { StateRootHash: 'abc123' },
      key: TEST_ACCOUNT,
      path: ['contract_hash_gateway'],
    });
    expect(JSON.parse(stdout[0] ?? '')).toHaveProperty('AddressableEntity.package_hash', 'package-deadbeef');
  });

  it('lists entry point signatures', async () => {
    const { run, stdout } = harness();

    await expect(run('entry-points', 'batch_handler')).resolves.toBe(0);

    expect(stdout).toEqual([
      'init()',
      'update_contract_config(asset_forwarder: String)',
      'handle_message()',
      'add_whitelisted_addresses(addresses: List<Key>)',
      'remove_whitelisted_addresses(addresses: List<Key>)',
    ]);
  });

  it('fails without a node address', async () => {
    const { run, stderr } = harness({});

    await expect(run('state-root-hash')).resolves.toBe(1);
    expect(stderr[0]?.startsWith('error: Invalid configuration')).toBe(true);
  });
});
