import { logger } from '../utils/logger';

// Keep test output free of importer logs
logger.silence();
