import { DeployerError } from '../errors/index.js';
import type { AccountHash } from '../types/deploy.js';

const ACCOUNT_HASH = /^account-hash-[0-9a-fA-F]{64}$/;

export function isAccountHash(value: string): value is AccountHash {
  return ACCOUNT_HASH.test(value);
}

export function assertAccountHash(value: string, fieldName: string): AccountHash {
  if (!isAccountHash(value)) {
    throw new DeployerError('INVALID_INPUT', `Invalid account hash for ${fieldName}: ${value}`);
  }
  return value;
}

export function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

export function isHexString(value: string): boolean {
  return value.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(value);
}
