import { MalformedResponseError, MissingNamedKeyError } from '../errors/index.js';
import type { PackageHash, StoredValue } from '../types/deploy.js';
import { stripPrefix } from '../utils/hash.js';

export interface EntityKindShape {
  kind: string;
  field: string;
  prefix: string;
}

/** Where each stored entity kind keeps its package reference, and the prefix that reference carries. */
export const ENTITY_KINDS: readonly EntityKindShape[] = [
  { kind: 'AddressableEntity', field: 'package_hash', prefix: 'package-' },
  { kind: 'Contract', field: 'contract_package_hash', prefix: 'contract-package-' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolvePackageHash(storedValue: StoredValue | null | undefined, namedKey: string): PackageHash {
  if (storedValue === null || storedValue === undefined) {
    throw new MissingNamedKeyError(namedKey);
  }

  for (const shape of ENTITY_KINDS) {
    const entity = storedValue[shape.kind];
    if (entity === undefined) {
      continue;
    }
    const raw = isRecord(entity) ? entity[shape.field] : undefined;
    if (typeof raw !== 'string') {
      throw new MalformedResponseError(
        `Stored ${shape.kind} under '${namedKey}' has no ${shape.field}`,
        storedValue,
      );
    }
    const packageHash = stripPrefix(raw, shape.prefix);
    if (packageHash.length === 0) {
      throw new MalformedResponseError(`Stored ${shape.kind} under '${namedKey}' has an empty ${shape.field}`, raw);
    }
    return packageHash;
  }

  const kinds = Object.keys(storedValue).join(', ') || 'nothing';
  throw new MalformedResponseError(
    `Named key '${namedKey}' holds ${kinds}, expected ${ENTITY_KINDS.map((shape) => shape.kind).join(' or ')}`,
    storedValue,
  );
}
