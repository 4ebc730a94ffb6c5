import { z } from 'zod';

import { DeployerError } from '../errors/index.js';
import { CL_SCALAR_TAGS } from '../types/deploy.js';
import type { ArgValue, CLType } from '../types/deploy.js';
import { isHexString } from './hash.js';

type UnsignedTag = 'U8' | 'U32' | 'U64' | 'U128' | 'U256' | 'U512';

const UNSIGNED_BITS: Record<UnsignedTag, number> = {
  U8: 8,
  U32: 32,
  U64: 64,
  U128: 128,
  U256: 256,
  U512: 512,
};

const KEY_PATTERN =
  /^(account-hash|hash|entity-contract|entity-account|entity-system|package|contract-package|uref)-[0-9a-fA-F]{64}(-\d{3})?$/;
const UREF_PATTERN = /^uref-[0-9a-fA-F]{64}-\d{3}$/;
const PUBLIC_KEY_PATTERN = /^(01[0-9a-fA-F]{64}|02[0-9a-fA-F]{66})$/;

export const clTypeSchema: z.ZodType<CLType> = z.lazy(() =>
  z.union([
    z.enum(CL_SCALAR_TAGS),
    z.object({ List: clTypeSchema }).strict(),
    z.object({ ByteArray: z.number().int().positive() }).strict(),
  ]),
);

export const argValueSchema: z.ZodType<ArgValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(argValueSchema)]),
);

export function formatCLType(type: CLType): string {
  if (typeof type === 'string') {
    return type;
  }
  if ('List' in type) {
    return `List<${formatCLType(type.List)}>`;
  }
  return `ByteArray(${type.ByteArray})`;
}

function checkUnsigned(value: ArgValue, tag: UnsignedTag): string | undefined {
  let parsed: bigint;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    parsed = BigInt(value);
  } else if (typeof value === 'string' && /^\d+$/.test(value)) {
    parsed = BigInt(value);
  } else {
    return `expected an unsigned integer for ${tag}, got ${JSON.stringify(value)}`;
  }
  if (parsed < 0n || parsed >= 1n << BigInt(UNSIGNED_BITS[tag])) {
    return `${parsed.toString()} is out of range for ${tag}`;
  }
  return undefined;
}

function checkPattern(value: ArgValue, pattern: RegExp, tag: string): string | undefined {
  if (typeof value === 'string' && pattern.test(value)) {
    return undefined;
  }
  return `expected a formatted ${tag}, got ${JSON.stringify(value)}`;
}

/** Returns a description of why `value` does not fit `type`, or undefined when it does. */
export function checkArgValue(type: CLType, value: ArgValue): string | undefined {
  if (typeof type !== 'string') {
    if ('List' in type) {
      if (!Array.isArray(value)) {
        return `expected a list for ${formatCLType(type)}, got ${JSON.stringify(value)}`;
      }
      for (const [index, item] of value.entries()) {
        const problem = checkArgValue(type.List, item);
        if (problem !== undefined) {
          return `item ${index}: ${problem}`;
        }
      }
      return undefined;
    }
    const width = type.ByteArray * 2;
    if (typeof value !== 'string' || value.length !== width || !isHexString(value)) {
      return `expected ${width} hex characters for ${formatCLType(type)}, got ${JSON.stringify(value)}`;
    }
    return undefined;
  }

  switch (type) {
    case 'Bool':
      return typeof value === 'boolean' ? undefined : `expected true or false for Bool, got ${JSON.stringify(value)}`;
    case 'String':
      return typeof value === 'string' ? undefined : `expected a string, got ${JSON.stringify(value)}`;
    case 'Key':
      return checkPattern(value, KEY_PATTERN, 'Key');
    case 'URef':
      return checkPattern(value, UREF_PATTERN, 'URef');
    case 'PublicKey':
      return checkPattern(value, PUBLIC_KEY_PATTERN, 'PublicKey');
    case 'U8':
    case 'U32':
    case 'U64':
    case 'U128':
    case 'U256':
    case 'U512':
      return checkUnsigned(value, type);
  }
}

/**
 * Turns a `name=value` command-line string into the JSON value the client
 * expects for `type`. Range and format checks happen later, in the registry.
 */
export function coerceArgValue(type: CLType, raw: string): ArgValue {
  if (typeof type !== 'string') {
    if ('ByteArray' in type) {
      return raw;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new DeployerError('INVALID_INPUT', `Expected a JSON array for ${formatCLType(type)}: ${raw}`, error);
    }
    const result = z.array(argValueSchema).safeParse(parsed);
    if (!result.success) {
      throw new DeployerError('INVALID_INPUT', `Expected a JSON array for ${formatCLType(type)}: ${raw}`);
    }
    return result.data;
  }

  switch (type) {
    case 'Bool':
      if (raw === 'true' || raw === 'false') {
        return raw === 'true';
      }
      throw new DeployerError('INVALID_INPUT', `Expected true or false for Bool: ${raw}`);
    case 'U8':
    case 'U32':
    case 'U64': {
      const asNumber = Number(raw);
      return /^\d+$/.test(raw) && Number.isSafeInteger(asNumber) ? asNumber : raw;
    }
    default:
      return raw;
  }
}
