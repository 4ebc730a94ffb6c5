import { execFile } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';

import type { Logger } from 'pino';
import { z } from 'zod';

import { DeployerError, SubmissionError } from '../errors/index.js';
import type { DeployRequest } from '../types/deploy.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  /** Null when the process was ended by a signal. */
  exitCode: number | null;
  signal?: string;
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandOutput>;

export interface DeploySubmitter {
  submit(request: DeployRequest): Promise<{ deployHash: string }>;
  /** The command a submission would run, for dry runs. */
  commandLine?(request: DeployRequest): string[];
}

/**
 * Runs a binary to completion. Resolves on any exit code or terminating
 * signal; rejects when it cannot be started or its output overflows.
 */
export const runCommand: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, [...args], { encoding: 'utf8', maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error === null) {
        resolve({ stdout, stderr, exitCode: 0 });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({ stdout, stderr, exitCode: error.code });
        return;
      }
      if (typeof error.signal === 'string' && error.code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
        resolve({ stdout, stderr, exitCode: null, signal: error.signal });
        return;
      }
      reject(error);
    });
  });

const LAUNCH_FAILURE_CODES = new Set(['ENOENT', 'EACCES']);

function isLaunchFailure(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && typeof error.code === 'string' && LAUNCH_FAILURE_CODES.has(error.code)
  );
}

const putDeployResponseSchema = z.object({
  result: z.object({ deploy_hash: z.string().min(1) }).passthrough().optional(),
  error: z.object({ code: z.number(), message: z.string() }).passthrough().optional(),
});

export function putDeployArguments(request: DeployRequest): string[] {
  return [
    'put-deploy',
    '--node-address',
    request.nodeAddress,
    '--chain-name',
    request.chainName,
    '--secret-key',
    request.secretKeyPath,
    '--payment-amount',
    request.paymentAmount.toString(),
    '--session-package-hash',
    request.packageHash,
    '--session-entry-point',
    request.entryPoint,
    '--session-args-json',
    JSON.stringify(request.args),
  ];
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

function extractJson(stdout: string): unknown {
  const start = stdout.indexOf('{');
  const end = stdout.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new SubmissionError('Client produced no JSON response', stdout);
  }
  try {
    return JSON.parse(stdout.slice(start, end + 1));
  } catch (error) {
    throw new SubmissionError('Client produced malformed JSON', error);
  }
}

export function parseDeployHash(stdout: string): string {
  const parsed = putDeployResponseSchema.safeParse(extractJson(stdout));
  if (!parsed.success) {
    throw new SubmissionError('Unexpected put-deploy response shape', parsed.error.issues);
  }
  if (parsed.data.error) {
    throw new SubmissionError(`Deploy rejected by node: ${parsed.data.error.message}`, parsed.data.error);
  }
  if (!parsed.data.result) {
    throw new SubmissionError('put-deploy response has no result.deploy_hash', parsed.data);
  }
  return parsed.data.result.deploy_hash;
}

export interface ClientBinarySubmitterOptions {
  /** Executable plus leading arguments, e.g. `['cargo', 'run', '--release', '--']`. */
  command: readonly string[];
  runner?: CommandRunner;
  logger?: Logger;
}

/** Hands signing and serialization to the node's command-line client. */
export class ClientBinarySubmitter implements DeploySubmitter {
  private readonly command: readonly string[];
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  public constructor(options: ClientBinarySubmitterOptions) {
    if (options.command.length === 0) {
      throw new DeployerError('CONFIG_ERROR', 'Client command must name an executable');
    }
    this.command = options.command;
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger;
  }

  public commandLine(request: DeployRequest): string[] {
    return [...this.command, ...putDeployArguments(request)];
  }

  public async submit(request: DeployRequest): Promise<{ deployHash: string }> {
    try {
      await access(request.secretKeyPath, constants.R_OK);
    } catch (error) {
      throw new DeployerError('CONFIG_ERROR', `Signing key file is not readable: ${request.secretKeyPath}`, error);
    }

    const [file, ...args] = this.commandLine(request);
    if (file === undefined) {
      throw new DeployerError('CONFIG_ERROR', 'Client command must name an executable');
    }
    this.logger?.debug({ file, args }, 'running put-deploy');

    let output: CommandOutput;
    try {
      output = await this.runner(file, args);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (isLaunchFailure(error)) {
        throw new SubmissionError(`Failed to launch ${file}: ${reason}`, error);
      }
      throw new SubmissionError(`${file} did not complete: ${reason}`, error);
    }
    if (output.exitCode === null) {
      const signal = output.signal ?? 'a signal';
      throw new SubmissionError(`${file} was terminated by ${signal}: ${lastLine(output.stderr)}`, output);
    }
    if (output.exitCode !== 0) {
      throw new SubmissionError(`${file} exited with code ${output.exitCode}: ${lastLine(output.stderr)}`, output);
    }
    return { deployHash: parseDeployHash(output.stdout) };
  }
}
