/**
 * Relay Logger
 */

import { buildLogger } from '@capture-relay/utils';
import { config } from '../config/index.js';

export const logger = buildLogger({
  level: config.logLevel,
  service: 'capture-relay',
  env: config.nodeEnv,
  file: config.logFile,
  keepLogs: config.keepLogs,
});
