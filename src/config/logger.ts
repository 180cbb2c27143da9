import winston from 'winston';
import { getEnv } from './environment.js';

const env = getEnv();

const lineFormat = winston.format.printf(({ level, message, timestamp }) =>
  `${String(timestamp)} ${level}: ${String(message)}`,
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    env.NODE_ENV === 'production' ? winston.format.uncolorize() : winston.format.colorize(),
    lineFormat,
  ),
  transports: [new winston.transports.Console()],
});
