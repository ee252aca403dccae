/**
 * JsonRpcClient Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RpcError, TimeoutError } from '@swarmwatch/types';
import { JsonRpcClient } from '../../src/rpc/json-rpc-client';
import type { FetchFn } from '../../src/rpc/json-rpc-client';

interface CapturedRequest {
  url: string;
  init?: RequestInit;
}

const target = { id: 'node-a', address: 'http://127.0.0.1:8332' };

function fakeFetch(respond: () => Response | Promise<Response>, captured: CapturedRequest[]): FetchFn {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return respond();
  };
}

describe('JsonRpcClient', () => {
  let captured: CapturedRequest[];

  beforeEach(() => {
    captured = [];
  });

  it('posts a JSON-RPC 1.0 request and returns the result', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response(JSON.stringify({ result: 812345, error: null, id: 1 })), captured),
    });

    await expect(client.call(target, 'getblockcount')).resolves.toBe(812345);

    expect(captured[0].url).toBe('http://127.0.0.1:8332');
    expect(captured[0].init?.method).toBe('POST');
    expect(JSON.parse(String(captured[0].init?.body))).toEqual({
      jsonrpc: '1.0',
      id: 1,
      method: 'getblockcount',
      params: [],
    });
  });

  it('numbers requests sequentially', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response(JSON.stringify({ result: null, error: null, id: 1 })), captured),
    });

    await client.call(target, 'a');
    await client.call(target, 'b', ['x', true]);

    const second = JSON.parse(String(captured[1].init?.body));
    expect(second.id).toBe(2);
    expect(second.params).toEqual(['x', true]);
  });

  it('sends basic auth when a user is configured', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      user: 'rpcuser',
      password: 'test-secret',
      fetchFn: fakeFetch(() => new Response(JSON.stringify({ result: 1 })), captured),
    });

    await client.call(target, 'getblockcount');

    const expected = `Basic ${Buffer.from('rpcuser:test-secret').toString('base64')}`;
    expect(new Headers(captured[0].init?.headers).get('authorization')).toBe(expected);
  });

  it('omits the auth header without a user', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response(JSON.stringify({ result: 1 })), captured),
    });

    await client.call(target, 'getblockcount');
    expect(new Headers(captured[0].init?.headers).get('authorization')).toBeNull();
  });

  it('maps an error envelope to RpcError with the node code', async () => {
    const body = { result: null, error: { code: -5, message: 'No such mempool transaction' }, id: 1 };
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response(JSON.stringify(body), { status: 500 }), captured),
    });

    const error = await client.call(target, 'getrawtransaction', ['abc', true]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({
      message: 'getrawtransaction failed on node-a: No such mempool transaction',
      rpcCode: -5,
      attempts: ['node-a'],
    });
  });

  it('maps a non-2xx status without an envelope to RpcError', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response('Unauthorized', { status: 401 }), captured),
    });

    await expect(client.call(target, 'getblockcount'))
      .rejects.toThrow('getblockcount failed on node-a: HTTP 401');
  });

  it('rejects an unparseable body', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(() => new Response('<html>'), captured),
    });

    await expect(client.call(target, 'getblockcount'))
      .rejects.toThrow('getblockcount returned an invalid JSON-RPC body from node-a');
  });

  it('maps an aborted request to TimeoutError', async () => {
    const client = new JsonRpcClient({
      timeoutMs: 250,
      fetchFn: async () => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      },
    });

    const error = await client.call(target, 'getmempoolinfo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', 'Timeout: getmempoolinfo exceeded 250ms in node-a');
  });

  it('wraps other transport failures in RpcError', async () => {
    const refused = new Error('connect ECONNREFUSED');
    const client = new JsonRpcClient({
      timeoutMs: 1000,
      fetchFn: async () => {
        throw refused;
      },
    });

    const error = await client.call(target, 'getblockcount').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({
      message: 'getblockcount transport failure on node-a',
      causes: [refused],
    });
  });
});
