export type JsonRpcParams = Readonly<Record<string, unknown>> | readonly unknown[];

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Raised by transports when the node answers with a JSON-RPC `error` member.
 * Bindings decide what the failure means for the method they called.
 */
export class JsonRpcResponseError extends Error {
  public readonly method: string;
  public readonly rpcError: JsonRpcErrorObject;

  public constructor(method: string, rpcError: JsonRpcErrorObject) {
    super(`${method} failed with code ${rpcError.code}: ${rpcError.message}`);
    this.name = 'JsonRpcResponseError';
    this.method = method;
    this.rpcError = rpcError;
  }
}

export interface NodeTransport {
  /** Resolves with the response's `result` member, which may be absent. */
  request(method: string, params?: JsonRpcParams): Promise<unknown>;
}
