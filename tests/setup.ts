import { logger } from '../src/logging/logger.js';

// Keep test output readable; tests that assert on logging spy on the methods
logger.silent = true;
