import { createDeployerClient, type DeploySubmitter, type NodeTransport } from '../src/index.js';

const transport: NodeTransport = {
  request: async (method) =>
    method === 'chain_get_state_root_hash'
      ? { state_root_hash: 'abc123' }
      : { stored_value: { AddressableEntity: { package_hash: 'package-deadbeef' } } },
};

const submitter: DeploySubmitter = {
  submit: async () => ({ deployHash: '0f'.repeat(32) }),
};

async function main() {
  const client = createDeployerClient(transport, submitter, {
    nodeAddress: 'http://127.0.0.1:7777',
    accountHash: `account-hash-${'ab'.repeat(32)}`,
    chainName: 'test-net',
    secretKeyPath: '/keys/secret_key.pem',
    contract: {
      name: 'fee_manager',
      namedKey: 'contract_hash_fee_manager',
      paymentAmount: 1_000_000n,
      entryPoints: [
        { name: 'init', args: [] },
        { name: 'set_fee', args: [{ name: 'fee', type: 'U128', value: '1' }] },
      ],
    },
  });

  const result = await client.execute('set_fee', { fee: '25' });
  console.log(result.deployHash, result.request.args);
}

void main();
