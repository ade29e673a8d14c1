import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.env === 'test' ? 'silent' : config.logLevel,
  base: { service: 'restaurant-ordering-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
