/**
 * JSON-RPC Pending Data Source
 *
 * PendingDataSource backed by the swarm router:
 * - getBestHeight     -> getblockcount
 * - getPendingBatch   -> getrawmempool, then getrawtransaction <id> true per new id
 * - getRecordDetail   -> getrawtransaction <id> true
 *
 * Ids already returned in an earlier batch are skipped, so a record is
 * classified once while it stays pending. The seen set is bounded.
 */

import { z } from 'zod';
import { RpcError } from '@swarmwatch/types';
import type { PendingDataSource, PendingRecord } from '@swarmwatch/types';
import { CircularBuffer, getErrorMessage, mapConcurrent } from '@swarmwatch/core';
import type { ILogger } from '@swarmwatch/core';

/**
 * The routing surface the data source needs. SwarmRouter satisfies it.
 */
export interface RpcRouter {
  call(method: string, params?: unknown[], explicitTarget?: string): Promise<unknown>;
}

export interface JsonRpcDataSourceOptions {
  logger: ILogger;
  /** Parallel detail lookups per batch (default 10) */
  detailConcurrency?: number;
  /** Ids remembered to skip re-classification (default 50000) */
  seenCapacity?: number;
}

const HeightSchema = z.number().int().nonnegative();
const PendingIdsSchema = z.array(z.string().min(1));
const RecordFieldsSchema = z.record(z.unknown());

export class JsonRpcDataSource implements PendingDataSource {
  private readonly logger: ILogger;
  private readonly detailConcurrency: number;
  private readonly seenOrder: CircularBuffer<string>;
  private readonly seen = new Set<string>();

  constructor(private readonly router: RpcRouter, options: JsonRpcDataSourceOptions) {
    this.logger = options.logger;
    this.detailConcurrency = options.detailConcurrency ?? 10;
    this.seenOrder = new CircularBuffer<string>(options.seenCapacity ?? 50000);
  }

  async getBestHeight(): Promise<number> {
    const result = await this.router.call('getblockcount');
    const height = HeightSchema.safeParse(result);
    if (!height.success) {
      throw new RpcError('getblockcount returned a non-integer height', 'getblockcount', []);
    }
    return height.data;
  }

  /**
   * Up to `limit` pending records not returned before, in node order.
   * Records whose detail lookup fails are skipped; they are retried next batch.
   *
   * @throws RpcError when the pending id list cannot be fetched
   */
  async getPendingBatch(limit: number): Promise<PendingRecord[]> {
    const result = await this.router.call('getrawmempool', []);
    const ids = PendingIdsSchema.safeParse(result);
    if (!ids.success) {
      throw new RpcError('getrawmempool returned an unexpected payload', 'getrawmempool', []);
    }

    const fresh = ids.data.filter(id => !this.seen.has(id)).slice(0, limit);
    if (fresh.length === 0) {
      return [];
    }

    const records = await mapConcurrent(
      fresh,
      async (id): Promise<PendingRecord | null> => {
        try {
          return await this.getRecordDetail(id);
        } catch (error) {
          this.logger.debug('Skipping record without detail', { recordId: id, error: getErrorMessage(error) });
          return null;
        }
      },
      this.detailConcurrency
    );

    const batch: PendingRecord[] = [];
    for (const record of records) {
      if (record) {
        this.markSeen(record.id);
        batch.push(record);
      }
    }
    return batch;
  }

  async getRecordDetail(id: string): Promise<PendingRecord> {
    const result = await this.router.call('getrawtransaction', [id, true]);
    const fields = RecordFieldsSchema.safeParse(result);
    if (!fields.success) {
      throw new RpcError(`getrawtransaction returned no object for ${id}`, 'getrawtransaction', []);
    }
    return { id, fields: fields.data };
  }

  get seenCount(): number {
    return this.seen.size;
  }

  private markSeen(id: string): void {
    if (this.seenOrder.isFull) {
      const evicted = this.seenOrder.shift();
      if (evicted !== undefined) {
        this.seen.delete(evicted);
      }
    }
    this.seenOrder.push(id);
    this.seen.add(id);
  }
}
