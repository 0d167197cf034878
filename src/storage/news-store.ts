/**
 * News table access
 * The ingestion loop only needs three operations on the table: the highest
 * stored id, which of a set of ids already exist, and a bulk insert.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EnvironmentConfig } from '../config/environment';
import type { StoredRecord } from '../types/news';
import { StoreError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface InsertOutcome {
  inserted: number;
  skipped: number;               // ids that were already stored
}

export interface NewsStore {
  fetchLatestId(): Promise<number | null>;
  fetchExistingIds(ids: number[]): Promise<Set<number>>;
  insertRecords(records: StoredRecord[]): Promise<InsertOutcome>;
}

const idRowsSchema = z.array(z.object({ id: z.number().int() }));

interface PostgrestFailure {
  message: string;
  code?: string;
}

function parseIdRows(operation: string, data: unknown): number[] {
  const parsed = idRowsSchema.safeParse(data ?? []);
  if (!parsed.success) {
    throw new StoreError(operation, `unexpected row shape: ${parsed.error.message}`);
  }
  return parsed.data.map(row => row.id);
}

function toStoreError(operation: string, error: PostgrestFailure): StoreError {
  return new StoreError(operation, error.message, error.code);
}

export class SupabaseNewsStore implements NewsStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table: string
  ) {}

  async fetchLatestId(): Promise<number | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('id')
      .order('id', { ascending: false })
      .limit(1);

    if (error) {
      throw toStoreError('select latest id', error);
    }

    const [latest] = parseIdRows('select latest id', data);
    return latest ?? null;
  }

  async fetchExistingIds(ids: number[]): Promise<Set<number>> {
    if (ids.length === 0) {
      return new Set();
    }

    const { data, error } = await this.supabase
      .from(this.table)
      .select('id')
      .in('id', ids);

    if (error) {
      throw toStoreError('select existing ids', error);
    }

    return new Set(parseIdRows('select existing ids', data));
  }

  /**
   * One write per batch. Ids already in the table (a batch partly committed by
   * an earlier cycle) are skipped by the primary key instead of failing the insert.
   */
  async insertRecords(records: StoredRecord[]): Promise<InsertOutcome> {
    if (records.length === 0) {
      return { inserted: 0, skipped: 0 };
    }

    const { data, error } = await this.supabase
      .from(this.table)
      .upsert(records, { onConflict: 'id', ignoreDuplicates: true })
      .select('id');

    if (error) {
      throw toStoreError('insert', error);
    }

    const inserted = parseIdRows('insert', data).length;
    if (inserted < records.length) {
      logger.warn(`Skipped ${records.length - inserted} ids already in ${this.table}`);
    }

    return { inserted, skipped: records.length - inserted };
  }
}

export function createNewsStore(config: Pick<EnvironmentConfig, 'supabase' | 'ingestion'>): NewsStore {
  const supabase = createClient(config.supabase.url, config.supabase.key, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return new SupabaseNewsStore(supabase, config.ingestion.table);
}
