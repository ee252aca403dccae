/**
 * Health Probe
 *
 * Queries one endpoint for its liveness/load sample. Three calls run in
 * parallel through the JSON-RPC transport, each bounded by the transport's
 * timeout. The probe never retries; the router decides what a failure means.
 */

import { z } from 'zod';
import { ProbeError } from '@swarmwatch/types';
import type { HealthSample } from '@swarmwatch/types';
import type { RpcTarget, RpcTransport } from '../rpc/json-rpc-client';
import { getErrorMessage } from '../resilience/error-handling';

/**
 * RPC method and the integer field of its result that feeds one sample value.
 */
export interface ProbeQuery {
  method: string;
  field: string;
}

export interface ProbeQueries {
  chainHeight: ProbeQuery;
  connections: ProbeQuery;
  backlogSize: ProbeQuery;
}

export const DEFAULT_PROBE_QUERIES: ProbeQueries = {
  chainHeight: { method: 'getblockchaininfo', field: 'blocks' },
  connections: { method: 'getnetworkinfo', field: 'connections' },
  backlogSize: { method: 'getmempoolinfo', field: 'size' },
};

const ResultObjectSchema = z.record(z.unknown());
const CountSchema = z.number().int().nonnegative();

export class HealthProbe {
  private readonly queries: ProbeQueries;

  constructor(
    private readonly transport: RpcTransport,
    queries: Partial<ProbeQueries> = {}
  ) {
    this.queries = { ...DEFAULT_PROBE_QUERIES, ...queries };
  }

  /**
   * @throws ProbeError when any call fails, times out or returns an unusable payload
   */
  async probe(endpoint: RpcTarget): Promise<HealthSample> {
    const [chainHeight, connections, backlogSize] = await Promise.all([
      this.query(endpoint, this.queries.chainHeight),
      this.query(endpoint, this.queries.connections),
      this.query(endpoint, this.queries.backlogSize),
    ]);
    return { chainHeight, connections, backlogSize };
  }

  private async query(endpoint: RpcTarget, query: ProbeQuery): Promise<number> {
    let result: unknown;
    try {
      result = await this.transport.call(endpoint, query.method, []);
    } catch (error) {
      throw new ProbeError(
        `${query.method} failed on ${endpoint.id}: ${getErrorMessage(error)}`,
        endpoint.id,
        error
      );
    }

    const payload = ResultObjectSchema.safeParse(result);
    const value = payload.success ? CountSchema.safeParse(payload.data[query.field]) : null;
    if (value === null || !value.success) {
      throw new ProbeError(
        `${query.method} on ${endpoint.id} returned no usable '${query.field}'`,
        endpoint.id
      );
    }
    return value.data;
  }
}
