import { logger } from './utils/logger';

// keep test output readable; tests that assert on logging re-enable it
logger.setEnabled(false);
