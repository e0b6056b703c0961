import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'sapi-resources',
  level: config.logLevel,
});
