import { logger } from '../src/config/logger';

logger.silent = true;
