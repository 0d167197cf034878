/**
 * Service entry point: load config, wire the store, run the scheduler.
 */

import { loadEnvironmentConfig, REQUIRED_VARIABLES, type EnvironmentConfig } from './config/environment';
import { runIngestionCycle } from './ingestion/run-ingestion';
import { IngestionScheduler, type ExitCode } from './ingestion/scheduler';
import { createNewsStore, type NewsStore } from './storage/news-store';
import { ConfigurationError } from './utils/errors';
import { logger } from './utils/logger';

const STOP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export interface MainOptions {
  env?: Record<string, string | undefined>;
  createStore?: (config: Readonly<EnvironmentConfig>) => NewsStore;
}

function loadConfig(env: Record<string, string | undefined>): Readonly<EnvironmentConfig> | null {
  try {
    return loadEnvironmentConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger.error(`Configuration error: ${error.message}`);
    logger.error(`Required environment variables: ${REQUIRED_VARIABLES.join(', ')}`);
    return null;
  }
}

export async function main({
  env = process.env,
  createStore = createNewsStore
}: MainOptions = {}): Promise<ExitCode> {
  const config = loadConfig(env);
  if (!config) {
    return 1;
  }

  logger.setLevel(config.logging.level);
  logger.info('Finnhub news ingestion service', {
    category: config.ingestion.category,
    table: config.ingestion.table,
    fetchLimit: config.ingestion.fetchLimit,
    pollIntervalMs: config.scheduler.pollIntervalMs
  });

  const store = createStore(config);
  const scheduler = new IngestionScheduler({
    runCycle: () => runIngestionCycle({ config, store }),
    settings: config.scheduler
  });

  const onSignal = () => scheduler.stop();
  STOP_SIGNALS.forEach(signal => process.on(signal, onSignal));

  try {
    return await scheduler.run(config.scheduler.runMode);
  } finally {
    STOP_SIGNALS.forEach(signal => process.off(signal, onSignal));
  }
}
