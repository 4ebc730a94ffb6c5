import type { Logger } from 'pino';
import yargs from 'yargs';

import { createDeployerClient } from '../client/create-client.js';
import type { DeployerClient } from '../client/deployer-client.js';
import { loadConfig } from '../config/env.js';
import type { ConfigOverrides } from '../config/env.js';
import { loadContractRegistry } from '../config/registry.js';
import { HttpJsonRpcTransport } from '../core/http-transport.js';
import { ClientBinarySubmitter } from '../core/submitter.js';
import type { DeploySubmitter } from '../core/submitter.js';
import type { NodeTransport } from '../core/transport.js';
import { DeployerError, describeError } from '../errors/index.js';
import type { ContractRegistry } from '../registry/contracts.js';
import type { ContractProfile, DeployRequest } from '../types/deploy.js';
import type { DeployerConfig } from '../types/config.js';
import { createLogger } from '../utils/logger.js';

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  createTransport(config: DeployerConfig): NodeTransport;
  createSubmitter(config: DeployerConfig, logger: Logger): DeploySubmitter;
  loadRegistry(path?: string): Promise<ContractRegistry>;
  logger?: Logger;
  stdout(line: string): void;
  stderr(line: string): void;
}

export const defaultCliDependencies: CliDependencies = {
  env: process.env,
  createTransport: (config) => new HttpJsonRpcTransport({ nodeAddress: config.nodeAddress, timeoutMs: config.timeoutMs }),
  createSubmitter: (config, logger) => new ClientBinarySubmitter({ command: config.clientCommand, logger }),
  loadRegistry: (path) => loadContractRegistry(path),
  stdout: (line) => {
    console.log(line);
  },
  stderr: (line) => {
    console.error(line);
  },
};

interface GlobalArgs {
  'node-address'?: string;
  'account-hash'?: string;
  'chain-name'?: string;
  'secret-key'?: string;
  'client-command'?: string;
  registry?: string;
  'timeout-ms'?: number;
  'resolve-attempts'?: number;
  'resolve-deadline-ms'?: number;
}

class UsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const USAGE = 'Usage: deploy-runner execute <contract> <entry-point> [--arg name=value ...] [--dry-run]';

function configOverrides(argv: GlobalArgs): ConfigOverrides {
  return {
    nodeAddress: argv['node-address'],
    accountHash: argv['account-hash'],
    chainName: argv['chain-name'],
    secretKeyPath: argv['secret-key'],
    clientCommand: argv['client-command'],
    registryPath: argv.registry,
    timeoutMs: argv['timeout-ms'],
    resolveAttempts: argv['resolve-attempts'],
    resolveDeadlineMs: argv['resolve-deadline-ms'],
  };
}

function describeRequest(request: DeployRequest, command: string[] | undefined): string {
  return JSON.stringify(
    {
      chain_name: request.chainName,
      payment_amount: request.paymentAmount.toString(),
      state_root_hash: request.stateRootHash,
      package_hash: request.packageHash,
      entry_point: request.entryPoint,
      args: request.args,
      command,
    },
    null,
    2,
  );
}

/** Parses `argv` and runs one command; resolves with the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = defaultCliDependencies): Promise<number> {
  const logger = deps.logger ?? createLogger('deploy-runner');

  const openClient = (
    args: GlobalArgs,
    contract?: ContractProfile,
  ): { client: DeployerClient; submitter: DeploySubmitter } => {
    const config = loadConfig(deps.env, configOverrides(args));
    const submitter = deps.createSubmitter(config, logger);
    const client = createDeployerClient(deps.createTransport(config), submitter, {
      nodeAddress: config.nodeAddress,
      accountHash: config.accountHash,
      chainName: config.chainName,
      secretKeyPath: config.secretKeyPath,
      contract,
      retry: { attempts: config.resolve.attempts, deadlineMs: config.resolve.deadlineMs },
      logger,
    });
    return { client, submitter };
  };

  const registryPath = (args: GlobalArgs): string | undefined => args.registry ?? deps.env.DEPLOY_REGISTRY;

  const parser = yargs([...argv])
    .scriptName('deploy-runner')
    .usage(USAGE)
    .option('node-address', { type: 'string', describe: 'Node URL (NODE_ADDRESS)' })
    .option('account-hash', { type: 'string', describe: 'Account holding the named keys (ACCOUNT_HASH)' })
    .option('chain-name', { type: 'string', describe: 'Chain name (CHAIN_NAME)' })
    .option('secret-key', { type: 'string', describe: 'Signing key file (SECRET_KEY_PATH)' })
    .option('client-command', { type: 'string', describe: 'Node client command line (CLIENT_COMMAND)' })
    .option('registry', { type: 'string', describe: 'Entry-point registry JSON (DEPLOY_REGISTRY)' })
    .option('timeout-ms', { type: 'number', describe: 'RPC request timeout (RPC_TIMEOUT_MS)' })
    .option('resolve-attempts', { type: 'number', describe: 'Package hash resolution attempts (RESOLVE_ATTEMPTS)' })
    .option('resolve-deadline-ms', { type: 'number', describe: 'Resolution deadline (RESOLVE_DEADLINE_MS)' })
    .command(
      'execute <contract> [entryPoint]',
      'Resolve the contract package and submit a deploy calling an entry point',
      (command) =>
        command
          .positional('contract', { type: 'string', demandOption: true })
          .positional('entryPoint', { type: 'string' })
          .option('arg', { type: 'string', array: true, describe: 'Override as name=value' })
          .option('dry-run', { type: 'boolean', default: false, describe: 'Print the deploy instead of submitting' }),
      async (args) => {
        const entryPoint = args.entryPoint;
        if (!entryPoint) {
          throw new UsageError(`No entry point provided. ${USAGE}`);
        }
        const registry = await deps.loadRegistry(registryPath(args));
        const contract = registry.get(args.contract);
        const pairs = args.arg ?? [];
        // An unknown entry point is reported after resolution unless overrides force an early lookup.
        const overrides = pairs.length > 0 ? registry.argumentsFor(contract.name).parseOverrides(entryPoint, pairs) : {};
        const { client, submitter } = openClient(args, contract);

        if (args['dry-run']) {
          const request = await client.prepareDeploy(entryPoint, overrides);
          deps.stdout(describeRequest(request, submitter.commandLine?.(request)));
          return;
        }
        const result = await client.execute(entryPoint, overrides);
        deps.stdout(result.deployHash);
      },
    )
    .command(
      'state-root-hash',
      'Print the current state root hash of the node',
      (command) => command,
      async (args) => {
        deps.stdout(await openClient(args).client.getStateRootHash());
      },
    )
    .command(
      'query <path>',
      'Print the stored value at a slash-separated path under the account',
      (command) => command.positional('path', { type: 'string', demandOption: true }),
      async (args) => {
        const { storedValue } = await openClient(args).client.queryAccountPath(args.path);
        deps.stdout(JSON.stringify(storedValue, null, 2));
      },
    )
    .command(
      'entry-points <contract>',
      'List the entry points of a contract with their argument types',
      (command) => command.positional('contract', { type: 'string', demandOption: true }),
      async (args) => {
        const registry = await deps.loadRegistry(registryPath(args));
        const entryPoints = registry.argumentsFor(args.contract);
        for (const name of entryPoints.entryPointNames()) {
          deps.stdout(entryPoints.signature(name));
        }
      },
    )
    .demandCommand(1, 'Specify a command')
    .strict()
    .version(false)
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw error ?? new UsageError(message ?? USAGE);
    });

  try {
    await parser.parseAsync();
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      deps.stderr(error.message);
    } else {
      if (!(error instanceof DeployerError)) {
        logger.debug({ err: error }, 'unexpected failure');
      }
      deps.stderr(`error: ${describeError(error)}`);
    }
    return 1;
  }
}
