export type DeployerErrorCode =
  | 'INVALID_INPUT'
  | 'CONFIG_ERROR'
  | 'CONNECTIVITY_ERROR'
  | 'EMPTY_RESULT'
  | 'NOT_FOUND'
  | 'MISSING_NAMED_KEY'
  | 'MALFORMED_RESPONSE'
  | 'UNKNOWN_ENTRY_POINT'
  | 'SUBMISSION_ERROR'
  | 'RETRY_EXHAUSTED';

export class DeployerError extends Error {
  public readonly code: DeployerErrorCode;
  public readonly details?: unknown;

  public constructor(code: DeployerErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DeployerError';
    this.code = code;
    this.details = details;
  }
}

/** The node could not be reached, or answered without a usable `result`. */
export class ConnectivityError extends DeployerError {
  public constructor(message: string, details?: unknown) {
    super('CONNECTIVITY_ERROR', message, details);
    this.name = 'ConnectivityError';
  }
}

/** A response arrived but the field the caller needs is absent or blank. */
export class EmptyResultError extends DeployerError {
  public constructor(message: string, details?: unknown) {
    super('EMPTY_RESULT', message, details);
    this.name = 'EmptyResultError';
  }
}

export class NotFoundError extends DeployerError {
  public constructor(message: string, details?: unknown) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class MissingNamedKeyError extends DeployerError {
  public readonly namedKey: string;

  public constructor(namedKey: string, details?: unknown) {
    super('MISSING_NAMED_KEY', `Named key '${namedKey}' is not present under the account`, details);
    this.name = 'MissingNamedKeyError';
    this.namedKey = namedKey;
  }
}

export class MalformedResponseError extends DeployerError {
  public constructor(message: string, details?: unknown) {
    super('MALFORMED_RESPONSE', message, details);
    this.name = 'MalformedResponseError';
  }
}

export class UnknownEntryPointError extends DeployerError {
  public readonly entryPoint: string;

  public constructor(entryPoint: string, known: readonly string[] = []) {
    const hint = known.length > 0 ? ` (known: ${known.join(', ')})` : '';
    super('UNKNOWN_ENTRY_POINT', `Invalid entry point '${entryPoint}'${hint}`);
    this.name = 'UnknownEntryPointError';
    this.entryPoint = entryPoint;
  }
}

export class SubmissionError extends DeployerError {
  public constructor(message: string, details?: unknown) {
    super('SUBMISSION_ERROR', message, details);
    this.name = 'SubmissionError';
  }
}

export function toDeployerError(error: unknown, fallback: DeployerErrorCode): DeployerError {
  if (error instanceof DeployerError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown deployer error';
  return new DeployerError(fallback, message, error);
}

/** One-line diagnostic, following `details` down one level when it carries the root cause. */
export function describeError(error: unknown): string {
  const normalized = toDeployerError(error, 'INVALID_INPUT');
  if (normalized.code === 'RETRY_EXHAUSTED' && normalized.details instanceof Error) {
    return `${normalized.message}: ${normalized.details.message}`;
  }
  return normalized.message;
}
