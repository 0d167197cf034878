#!/usr/bin/env tsx

/**
 * Runner for the news ingestion service
 * Loads environment variables, then runs once or continuously per RUN_MODE
 */

import dotenv from 'dotenv';
import path from 'path';

// Find project root (go up two levels from scripts/ingestion directory)
const projectRoot = path.resolve(__dirname, '../..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { main } from '../../src/main';
import { logger } from '../../src/utils/logger';

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
