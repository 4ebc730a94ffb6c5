import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { DeployerError } from '../errors/index.js';
import { ContractRegistry } from '../registry/contracts.js';
import type { ContractProfile } from '../types/deploy.js';
import { argValueSchema, checkArgValue, clTypeSchema } from '../utils/cl-type.js';

export const DEFAULT_REGISTRY_PATH = fileURLToPath(new URL('../../data/contracts.json', import.meta.url));

const typedArgSchema = z
  .object({
    name: z.string().min(1),
    type: clTypeSchema,
    value: argValueSchema,
  })
  .strict()
  .superRefine((arg, ctx) => {
    const problem = checkArgValue(arg.type, arg.value);
    if (problem !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${arg.name}: ${problem}` });
    }
  });

const argListSchema = z.array(typedArgSchema).superRefine((args, ctx) => {
  const seen = new Set<string>();
  for (const arg of args) {
    if (seen.has(arg.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate argument '${arg.name}'` });
    }
    seen.add(arg.name);
  }
});

const profileSchema = z.object({
  name: z.string().min(1),
  namedKey: z.string().min(1),
  paymentAmount: z
    .union([z.string().regex(/^[1-9]\d*$/), z.number().int().positive()])
    .transform((amount) => BigInt(amount)),
  entryPoints: z.record(argListSchema),
});

const registryFileSchema = z.object({
  contracts: z.array(profileSchema).min(1),
});

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function parseContractRegistry(data: unknown, source = 'registry'): ContractRegistry {
  const parsed = registryFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new DeployerError('CONFIG_ERROR', `Invalid ${source}: ${formatIssues(parsed.error.issues)}`, parsed.error.issues);
  }

  const names = new Set<string>();
  const profiles: ContractProfile[] = parsed.data.contracts.map((contract) => {
    if (names.has(contract.name)) {
      throw new DeployerError('CONFIG_ERROR', `Invalid ${source}: duplicate contract '${contract.name}'`);
    }
    names.add(contract.name);
    return {
      name: contract.name,
      namedKey: contract.namedKey,
      paymentAmount: contract.paymentAmount,
      entryPoints: Object.entries(contract.entryPoints).map(([name, args]) => ({ name, args })),
    };
  });
  return new ContractRegistry(profiles);
}

export async function loadContractRegistry(filePath: string = DEFAULT_REGISTRY_PATH): Promise<ContractRegistry> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new DeployerError('CONFIG_ERROR', `Cannot read registry file ${filePath}`, error);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new DeployerError('CONFIG_ERROR', `Registry file ${filePath} is not valid JSON`, error);
  }
  return parseContractRegistry(data, filePath);
}
