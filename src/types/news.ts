import { z } from 'zod';

// Article as returned by the Finnhub /news endpoint. Only `id` is required;
// unknown keys (image, related) are stripped.
export const articleSchema = z.object({
  id: z.number().int(),
  category: z.string().nullish(),
  datetime: z.number().nullish(),      // unix seconds
  headline: z.string().nullish(),
  source: z.string().nullish(),
  summary: z.string().nullish(),
  url: z.string().nullish()
});

export type Article = z.infer<typeof articleSchema>;

// Row shape of the news table
export interface StoredRecord {
  id: number;
  category: string;
  datetime: number | null;
  headline: string;
  source: string;
  summary: string;
  url: string;
  ingested_at: string;                 // ISO 8601, local processing time
}

export type RunMode = 'once' | 'continuous';

/**
 * Outcome of a stage that never fails its caller: either the real value or
 * the default it degraded to, with the reason.
 */
export type StageResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'recovered'; value: T; error: string };

export type PersistResult =
  | { success: true; inserted: number; preview: string[] }
  | { success: false; error: string };

export interface CycleStats {
  cursor: number;
  fetched: number;
  candidates: number;
  duplicates: number;
  stored: number;
  durationMs: number;
}

export interface CycleResult {
  success: boolean;
  stats: CycleStats;
  error?: string;
}
