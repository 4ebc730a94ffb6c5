import { z } from 'zod';

import {
  ConnectivityError,
  EmptyResultError,
  MalformedResponseError,
  NotFoundError,
  toDeployerError,
} from '../errors/index.js';
import { JsonRpcResponseError } from '../core/transport.js';
import type { NodeTransport } from '../core/transport.js';
import type { StateRootHash, StoredValue } from '../types/deploy.js';

export interface NodeBindings {
  getStateRootHash(): Promise<StateRootHash>;
  queryState(stateRootHash: StateRootHash, key: string, path: readonly string[]): Promise<StoredValue>;
}

const stateRootResultSchema = z.object({ state_root_hash: z.string().nullish() }).passthrough();

const queryResultSchema = z.object({ stored_value: z.record(z.unknown()) }).passthrough();

export function splitQueryPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

export function createNodeBindings(transport: NodeTransport): NodeBindings {
  return {
    async getStateRootHash(): Promise<StateRootHash> {
      let result: unknown;
      try {
        result = await transport.request('chain_get_state_root_hash');
      } catch (error) {
        if (error instanceof JsonRpcResponseError) {
          throw new ConnectivityError(`Failed to retrieve state_root_hash: ${error.message}`, error.rpcError);
        }
        throw toDeployerError(error, 'CONNECTIVITY_ERROR');
      }
      if (result === undefined || result === null) {
        throw new ConnectivityError('Failed to retrieve state_root_hash: response has no result field');
      }
      const parsed = stateRootResultSchema.safeParse(result);
      if (!parsed.success) {
        throw new ConnectivityError('Failed to retrieve state_root_hash: result is not an object', result);
      }
      const hash = parsed.data.state_root_hash;
      if (!hash) {
        throw new EmptyResultError('Failed to retrieve state_root_hash: result.state_root_hash is empty', result);
      }
      return hash;
    },

    async queryState(stateRootHash, key, path): Promise<StoredValue> {
      let result: unknown;
      try {
        result = await transport.request('query_global_state', {
          state_identifier: { StateRootHash: stateRootHash },
          key,
          path: [...path],
        });
      } catch (error) {
        if (error instanceof JsonRpcResponseError) {
          throw new NotFoundError(
            `Path '${path.join('/')}' does not resolve under ${key} at ${stateRootHash}: ${error.rpcError.message}`,
            error.rpcError,
          );
        }
        throw toDeployerError(error, 'CONNECTIVITY_ERROR');
      }
      const parsed = queryResultSchema.safeParse(result);
      if (!parsed.success) {
        throw new MalformedResponseError(
          `query_global_state response for '${path.join('/')}' has no result.stored_value`,
          result,
        );
      }
      return parsed.data.stored_value;
    },
  };
}
