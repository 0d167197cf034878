/**
 * Ingestion cycle
 *
 * One pass of the pipeline, strictly in sequence:
 * 1. Resolve the minId cursor from the highest stored id
 * 2. Fetch the latest articles for the configured category
 * 3. Drop articles already stored and normalize the rest
 * 4. Bulk-insert the new records
 *
 * Only a failed insert fails the cycle. Read and fetch problems degrade to
 * defaults inside their stage.
 */

import type { EnvironmentConfig } from '../config/environment';
import type { NewsStore } from '../storage/news-store';
import type { CycleResult, CycleStats } from '../types/news';
import { logger } from '../utils/logger';
import {
  fetchNewsExecute,
  filterNewArticlesExecute,
  resolveCursorExecute,
  storeRecordsExecute
} from './tools/ingestion-helpers';

export interface IngestionContext {
  config: Readonly<EnvironmentConfig>;
  store: NewsStore;
  now?: () => Date;
}

export async function runIngestionCycle({ config, store, now }: IngestionContext): Promise<CycleResult> {
  const startTime = Date.now();
  const { category, fallbackMinId, fetchLimit } = config.ingestion;

  logger.info(`Starting ${category} news ingestion`);

  const cursor = await resolveCursorExecute({ store, fallbackMinId });

  const fetchResult = await fetchNewsExecute({
    finnhub: config.finnhub,
    category,
    minId: cursor.value,
    limit: fetchLimit
  });

  const stats: CycleStats = {
    cursor: cursor.value,
    fetched: fetchResult.fetched,
    candidates: fetchResult.value.length,
    duplicates: 0,
    stored: 0,
    durationMs: 0
  };

  if (fetchResult.value.length === 0) {
    logger.info(`No ${category} articles fetched`);
    stats.durationMs = Date.now() - startTime;
    return { success: true, stats };
  }

  const filtered = await filterNewArticlesExecute({
    store,
    articles: fetchResult.value,
    category,
    now
  });
  stats.duplicates = filtered.duplicates;

  const persisted = await storeRecordsExecute({ store, records: filtered.value });
  stats.durationMs = Date.now() - startTime;

  if (!persisted.success) {
    logger.error(`${category} ingestion failed`, persisted.error, { stats });
    return { success: false, stats, error: persisted.error };
  }

  stats.stored = persisted.inserted;
  logger.info(`${category} ingestion completed successfully`, { stats });
  return { success: true, stats };
}
