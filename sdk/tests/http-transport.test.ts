import axios from 'axios';
import { describe, expect, it } from 'vitest';

import { HttpJsonRpcTransport, rpcUrl } from '../src/core/http-transport.js';
import { JsonRpcResponseError } from '../src/core/transport.js';
import { ConnectivityError, MalformedResponseError } from '../src/errors/index.js';

function stubNode(reply: (body: unknown) => unknown) {
  const bodies: unknown[] = [];
  const http = axios.create({
    baseURL: 'http://node.test:7777/rpc',
    adapter: async (config) => {
      const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
      bodies.push(body);
      return { data: reply(body), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { bodies, transport: new HttpJsonRpcTransport({ nodeAddress: 'http://node.test:7777', http }) };
}

describe('http json-rpc transport', () => {
  it('appends /rpc to bare node addresses', () => {
    expect(rpcUrl('http://node.test:7777')).toBe('http://node.test:7777/rpc');
    expect(rpcUrl('http://node.test:7777/')).toBe('http://node.test:7777/rpc');
    expect(rpcUrl('http://node.test:7777/rpc')).toBe('http://node.test:7777/rpc');
  });

  it('posts JSON-RPC envelopes with increasing ids and returns result', async () => {
    const { bodies, transport } = stubNode(() => ({ jsonrpc: '2.0', id: 1, result: { state_root_hash: 'abc123' } }));

    await expect(transport.request('chain_get_state_root_hash')).resolves.toEqual({ state_root_hash: 'abc123' });
    await transport.request('query_global_state', { key: 'k', path: [] });

    expect(bodies).toEqual([
      { jsonrpc: '2.0', id: 1, method: 'chain_get_state_root_hash' },
      { jsonrpc: '2.0', id: 2, method: 'query_global_state', params: { key: 'k', path: [] } },
    ]);
  });

  it('surfaces JSON-RPC errors', async () => {
    const { transport } = stubNode(() => ({ jsonrpc: '2.0', id: 1, error: { code: -32003, message: 'Query failed' } }));
    const request = transport.request('query_global_state', {});

    await expect(request).rejects.toBeInstanceOf(JsonRpcResponseError);
    await expect(request).rejects.toThrow('query_global_state failed with code -32003: Query failed');
  });

  it('reports transport failures as connectivity errors', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:7777');
      },
    });
    const transport = new HttpJsonRpcTransport({ nodeAddress: 'http://127.0.0.1:7777', http });
    const request = transport.request('chain_get_state_root_hash');

    await expect(request).rejects.toBeInstanceOf(ConnectivityError);
    await expect(request).rejects.toThrow(
      'Node at http://127.0.0.1:7777/rpc is unreachable (chain_get_state_root_hash): connect ECONNREFUSED 127.0.0.1:7777',
    );
  });

  it('rejects bodies that are not JSON-RPC envelopes', async () => {
    const { transport } = stubNode(() => 'Bad Gateway');
    await expect(transport.request('chain_get_state_root_hash')).rejects.toBeInstanceOf(MalformedResponseError);
  });
});
