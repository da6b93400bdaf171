/**
 * Pool state persistence.
 *
 * One row per pool id holding the latest committed snapshot. Supabase table:
 *
 *   create table pool_state (
 *     pool_id    text primary key,
 *     snapshot   jsonb not null,
 *     updated_at timestamptz not null
 *   );
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { ExternalFailure } from '../core/errors';
import type { PoolSnapshot } from '../engine/MultiStrategyPool';
import logger from '../utils/logger';
import { parseSnapshot, serializeSnapshot, type SerializedPoolSnapshot } from './snapshotCodec';

export const POOL_STATE_TABLE = 'pool_state';

export interface PoolStateRepository {
    load(poolId: string): Promise<PoolSnapshot | null>;
    save(poolId: string, snapshot: PoolSnapshot): Promise<void>;
}

/** Keeps serialized rows, so a load always goes through the parser */
export class InMemoryPoolStateRepository implements PoolStateRepository {
    private rows = new Map<string, SerializedPoolSnapshot>();

    async load(poolId: string): Promise<PoolSnapshot | null> {
        const row = this.rows.get(poolId);
        return row ? parseSnapshot(JSON.parse(JSON.stringify(row))) : null;
    }

    async save(poolId: string, snapshot: PoolSnapshot): Promise<void> {
        this.rows.set(poolId, serializeSnapshot(snapshot));
    }

    size(): number {
        return this.rows.size;
    }
}

export class SupabasePoolStateRepository implements PoolStateRepository {
    constructor(private readonly client: SupabaseClient) {}

    async load(poolId: string): Promise<PoolSnapshot | null> {
        const { data, error } = await this.client
            .from(POOL_STATE_TABLE)
            .select('snapshot')
            .eq('pool_id', poolId)
            .maybeSingle();

        if (error) {
            logger.error(`[STORAGE] load ${poolId} failed: ${error.message}`);
            throw new ExternalFailure('STORAGE_READ_FAILED', error.message, { poolId, table: POOL_STATE_TABLE });
        }
        if (!data) return null;

        const row: unknown = data;
        if (typeof row !== 'object' || row === null || !('snapshot' in row)) {
            throw new ExternalFailure('STORAGE_READ_FAILED', 'row has no snapshot column', { poolId });
        }
        return parseSnapshot(row.snapshot);
    }

    async save(poolId: string, snapshot: PoolSnapshot): Promise<void> {
        const { error } = await this.client
            .from(POOL_STATE_TABLE)
            .upsert({
                pool_id: poolId,
                snapshot: serializeSnapshot(snapshot),
                updated_at: new Date().toISOString(),
            });

        if (error) {
            logger.error(`[STORAGE] save ${poolId} failed: ${error.message}`);
            throw new ExternalFailure('STORAGE_WRITE_FAILED', error.message, { poolId, table: POOL_STATE_TABLE });
        }
        logger.debug(`[STORAGE] saved ${poolId}`);
    }
}
