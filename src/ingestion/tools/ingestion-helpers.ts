/**
 * Ingestion Helper Functions
 * One function per pipeline stage. Each returns a result object instead of
 * throwing, so the cycle can decide what counts as a failure.
 */

import type { EnvironmentConfig } from '../../config/environment';
import type { NewsStore } from '../../storage/news-store';
import {
  articleSchema,
  type Article,
  type PersistResult,
  type StageResult,
  type StoredRecord
} from '../../types/news';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

const PREVIEW_COUNT = 3;
const PREVIEW_LENGTH = 60;

export type FetchNewsResult = StageResult<Article[]> & { fetched: number };
export type FilterResult = StageResult<StoredRecord[]> & { duplicates: number };

/**
 * Newest first; a missing datetime sorts as 0 (oldest)
 */
export function selectLatest(articles: Article[], limit: number): Article[] {
  return [...articles]
    .sort((a, b) => (b.datetime ?? 0) - (a.datetime ?? 0))
    .slice(0, limit);
}

export function formatArticle(article: Article, category: string, now: Date): StoredRecord {
  return {
    id: article.id,
    category: article.category ?? category,
    datetime: article.datetime ?? null,
    headline: article.headline ?? '',
    source: article.source ?? '',
    summary: article.summary ?? '',
    url: article.url ?? '',
    ingested_at: now.toISOString()
  };
}

export function headlinePreview(records: StoredRecord[]): string[] {
  return records.slice(0, PREVIEW_COUNT).map(record =>
    record.headline.length > PREVIEW_LENGTH
      ? `${record.headline.slice(0, PREVIEW_LENGTH)}...`
      : record.headline
  );
}

// Execute Functions

export const resolveCursorExecute = async ({
  store,
  fallbackMinId
}: {
  store: NewsStore;
  fallbackMinId: number;
}): Promise<StageResult<number>> => {
  try {
    const latestId = await store.fetchLatestId();

    if (latestId === null) {
      logger.info(`No previous records, using default minId: ${fallbackMinId}`);
      return { status: 'recovered', value: fallbackMinId, error: 'empty store' };
    }

    logger.info(`Last ID in database: ${latestId}`);
    return { status: 'ok', value: latestId };
  } catch (error) {
    logger.warn(`Could not get last ID, using default minId: ${fallbackMinId}`, {
      error: errorMessage(error)
    });
    return { status: 'recovered', value: fallbackMinId, error: errorMessage(error) };
  }
};

export const fetchNewsExecute = async ({
  finnhub,
  category,
  minId,
  limit
}: {
  finnhub: EnvironmentConfig['finnhub'];
  category: string;
  minId: number;
  limit: number;
}): Promise<FetchNewsResult> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), finnhub.requestTimeoutMs);

  try {
    const url = new URL(finnhub.apiUrl);
    url.searchParams.set('category', category);
    url.searchParams.set('minId', String(minId));
    url.searchParams.set('token', finnhub.apiKey);

    logger.info(`Fetching ${category} news with minId: ${minId}`);

    const response = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: 'application/json' }
    });

    if (!response.ok) {
      throw new Error(`HTTP error! status: ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
      throw new Error('Expected an array of articles');
    }

    const articles: Article[] = [];
    for (const item of body) {
      const parsed = articleSchema.safeParse(item);
      if (parsed.success) {
        articles.push(parsed.data);
      } else {
        logger.warn('Skipping malformed article', { issues: parsed.error.issues.length });
      }
    }

    logger.info(`Fetched ${body.length} ${category} news articles`);

    return { status: 'ok', value: selectLatest(articles, limit), fetched: body.length };
  } catch (error) {
    const message = error instanceof Error && error.name === 'AbortError'
      ? 'Request timeout'
      : errorMessage(error);
    logger.error('Error fetching news:', message);
    return { status: 'recovered', value: [], error: message, fetched: 0 };
  } finally {
    clearTimeout(timeout);
  }
};

export const filterNewArticlesExecute = async ({
  store,
  articles,
  category,
  now = () => new Date()
}: {
  store: NewsStore;
  articles: Article[];
  category: string;
  now?: () => Date;
}): Promise<FilterResult> => {
  if (articles.length === 0) {
    return { status: 'ok', value: [], duplicates: 0 };
  }

  const format = (candidates: Article[]) =>
    candidates.map(article => formatArticle(article, category, now()));

  try {
    const existing = await store.fetchExistingIds(articles.map(article => article.id));
    logger.info(`Found ${existing.size} duplicates`);

    const fresh = articles.filter(article => !existing.has(article.id));
    return {
      status: 'ok',
      value: format(fresh),
      duplicates: articles.length - fresh.length
    };
  } catch (error) {
    // Treat everything as new: a duplicate insert beats silently dropping articles
    logger.error('Error checking duplicates:', errorMessage(error));
    return {
      status: 'recovered',
      value: format(articles),
      duplicates: 0,
      error: errorMessage(error)
    };
  }
};

export const storeRecordsExecute = async ({
  store,
  records
}: {
  store: NewsStore;
  records: StoredRecord[];
}): Promise<PersistResult> => {
  if (records.length === 0) {
    logger.info('All articles already exist - no new articles to add');
    return { success: true, inserted: 0, preview: [] };
  }

  try {
    const outcome = await store.insertRecords(records);
    const preview = headlinePreview(records);

    logger.info(`Stored ${outcome.inserted} new articles`, { skipped: outcome.skipped });
    preview.forEach((headline, index) => logger.info(`  ${index + 1}. ${headline}`));

    return { success: true, inserted: outcome.inserted, preview };
  } catch (error) {
    logger.error('Error storing articles:', errorMessage(error));
    return { success: false, error: errorMessage(error) };
  }
};
