export type StateRootHash = string;

export type AccountHash = `account-hash-${string}`;

/** Bare hex identifier of a contract package, without any `package-` style prefix. */
export type PackageHash = string;

export const CL_SCALAR_TAGS = [
  'Bool',
  'U8',
  'U32',
  'U64',
  'U128',
  'U256',
  'U512',
  'String',
  'Key',
  'URef',
  'PublicKey',
] as const;

export type CLScalarTag = (typeof CL_SCALAR_TAGS)[number];

export type CLType = CLScalarTag | { List: CLType } | { ByteArray: number };

export type ArgValue = string | number | boolean | ArgValue[];

export interface TypedArg {
  name: string;
  type: CLType;
  value: ArgValue;
}

export interface EntryPointSpec {
  name: string;
  args: readonly TypedArg[];
}

export interface ContractProfile {
  name: string;
  namedKey: string;
  paymentAmount: bigint;
  entryPoints: readonly EntryPointSpec[];
}

export type ArgOverrides = Readonly<Record<string, ArgValue>>;

/** Stored value as returned under `result.stored_value`, keyed by entity kind. */
export type StoredValue = Record<string, unknown>;

export interface ResolvedSession {
  stateRootHash: StateRootHash;
  packageHash: PackageHash;
}

export interface DeployParams {
  nodeAddress: string;
  chainName: string;
  secretKeyPath: string;
  paymentAmount: bigint;
  session: ResolvedSession;
  entryPoint: string;
  args: readonly TypedArg[];
}

export interface DeployRequest {
  nodeAddress: string;
  chainName: string;
  secretKeyPath: string;
  paymentAmount: bigint;
  stateRootHash: StateRootHash;
  packageHash: PackageHash;
  entryPoint: string;
  args: readonly TypedArg[];
}

export interface DeployResult {
  deployHash: string;
  request: DeployRequest;
}
