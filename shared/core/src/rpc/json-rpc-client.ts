/**
 * JSON-RPC Client
 *
 * Single-call HTTP JSON-RPC transport used by the health probe and the
 * router. Every call carries its own timeout; basic auth is sent when
 * credentials are configured.
 */

import { z } from 'zod';
import { RpcError, TimeoutError } from '@swarmwatch/types';
import type { EndpointDescriptor } from '@swarmwatch/types';

// =============================================================================
// Types
// =============================================================================

export interface JsonRpcRequest {
  jsonrpc: '1.0';
  id: number;
  method: string;
  params: unknown[];
}

/**
 * Response envelope. Nodes answer `{ result, error: null, id }` on success and
 * `{ result: null, error: { code, message }, id }` on failure, sometimes with
 * a non-2xx HTTP status.
 */
export const JsonRpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .nullable()
    .optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
});

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

export type FetchFn = typeof fetch;

export type RpcTarget = Pick<EndpointDescriptor, 'id' | 'address'>;

export interface JsonRpcClientOptions {
  timeoutMs: number;
  user?: string;
  password?: string;
  /** Injected for tests; defaults to the global fetch */
  fetchFn?: FetchFn;
}

/**
 * Call surface shared by the router and the probe.
 */
export interface RpcTransport {
  call(target: RpcTarget, method: string, params?: unknown[]): Promise<unknown>;
}

// =============================================================================
// Implementation
// =============================================================================

export class JsonRpcClient implements RpcTransport {
  private readonly fetchFn: FetchFn;
  private readonly headers: Record<string, string>;
  private nextId = 1;

  constructor(private readonly options: JsonRpcClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.headers = { 'Content-Type': 'application/json' };
    if (options.user !== undefined) {
      const credentials = Buffer.from(`${options.user}:${options.password ?? ''}`).toString('base64');
      this.headers.Authorization = `Basic ${credentials}`;
    }
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  /**
   * Issue one call and return the raw `result` value.
   *
   * @throws TimeoutError when no response arrives within timeoutMs
   * @throws RpcError on transport failure, an unparseable body or a node-side error
   */
  async call(target: RpcTarget, method: string, params: unknown[] = []): Promise<unknown> {
    const request: JsonRpcRequest = { jsonrpc: '1.0', id: this.nextId++, method, params };

    let response: Response;
    try {
      response = await this.fetchFn(target.address, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TimeoutError(method, this.options.timeoutMs, target.id);
      }
      throw new RpcError(`${method} transport failure on ${target.id}`, method, [target.id], [error]);
    }

    const text = await response.text();
    const envelope = parseEnvelope(text);

    if (envelope?.error) {
      throw new RpcError(
        `${method} failed on ${target.id}: ${envelope.error.message}`,
        method,
        [target.id],
        [],
        envelope.error.code
      );
    }
    if (!response.ok) {
      throw new RpcError(
        `${method} failed on ${target.id}: HTTP ${response.status}`,
        method,
        [target.id]
      );
    }
    if (!envelope) {
      throw new RpcError(`${method} returned an invalid JSON-RPC body from ${target.id}`, method, [target.id]);
    }

    return envelope.result;
  }
}

function parseEnvelope(text: string): JsonRpcResponse | null {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = JsonRpcResponseSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}
