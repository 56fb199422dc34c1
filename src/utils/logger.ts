import pino from 'pino';
import { config } from '../config/index.js';

// stdout belongs to the progress line; logs go to stderr.
const isDevelopment = config.server.nodeEnv === 'development';

export const logger = isDevelopment
  ? pino({
      name: 'assert-miner',
      level: config.server.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino({ name: 'assert-miner', level: config.server.logLevel }, pino.destination(2));
