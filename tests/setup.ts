import winston from 'winston';
import { setLogger } from '../src/infra/logger.js';

setLogger(
  winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  })
);
