import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { ConnectivityError, MalformedResponseError } from '../errors/index.js';
import { JsonRpcResponseError } from './transport.js';
import type { JsonRpcParams, NodeTransport } from './transport.js';

export interface HttpTransportConfig {
  nodeAddress: string;
  timeoutMs?: number;
  /** Preconfigured instance; its `baseURL` is used as-is. */
  http?: AxiosInstance;
}

const envelopeSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

export function rpcUrl(nodeAddress: string): string {
  const trimmed = nodeAddress.replace(/\/+$/, '');
  return trimmed.endsWith('/rpc') ? trimmed : `${trimmed}/rpc`;
}

export class HttpJsonRpcTransport implements NodeTransport {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;
  private nextId = 1;

  public constructor(config: HttpTransportConfig) {
    this.endpoint = rpcUrl(config.nodeAddress);
    this.http =
      config.http ??
      axios.create({
        baseURL: this.endpoint,
        timeout: config.timeoutMs ?? 10_000,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  public async request(method: string, params?: JsonRpcParams): Promise<unknown> {
    const id = this.nextId;
    this.nextId += 1;
    const body = params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params };

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('', body);
      data = response.data;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConnectivityError(`Node at ${this.endpoint} is unreachable (${method}): ${reason}`, error);
    }

    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new MalformedResponseError(`Node returned a non JSON-RPC body for ${method}`, envelope.error.issues);
    }
    if (envelope.data.error) {
      throw new JsonRpcResponseError(method, envelope.data.error);
    }
    return envelope.data.result;
  }
}
