import { logger } from './observability/logger.js';

logger.setLevel('silent');
