/**
 * Pino Logger Instance
 * 
 * Structured JSON logging for production observability.
 */

import { pino, type LoggerOptions } from 'pino';
import { buildLoggerOptions } from '@mediakit/utils';
import { config } from '../config/index.js';

export const loggerOptions: LoggerOptions = buildLoggerOptions({
  service: 'mediakit-api',
  level: config.logLevel,
  env: config.nodeEnv,
});

export const logger = pino(loggerOptions);
