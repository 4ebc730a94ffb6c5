import 'dotenv/config';

import { createDeployerClient, HttpJsonRpcTransport, loadConfig, type DeploySubmitter } from '../src/index.js';

// Read-only: nothing is submitted.
const submitter: DeploySubmitter = {
  submit: async () => {
    throw new Error('query-state does not submit deploys');
  },
};

async function main() {
  const config = loadConfig(process.env);
  const transport = new HttpJsonRpcTransport({ nodeAddress: config.nodeAddress, timeoutMs: config.timeoutMs });
  const client = createDeployerClient(transport, submitter, {
    nodeAddress: config.nodeAddress,
    accountHash: config.accountHash,
  });

  const path = process.argv[2] ?? '';
  const { stateRootHash, storedValue } = await client.queryAccountPath(path);
  console.log(stateRootHash);
  console.log(JSON.stringify(storedValue, null, 2));
}

void main();
