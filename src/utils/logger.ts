import winston from 'winston';
import { DEFAULT_CONFIG } from '../config/default';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (DEFAULT_CONFIG.LOG_FILE) {
  transports.push(new winston.transports.File({ filename: DEFAULT_CONFIG.LOG_FILE }));
}

const logger = winston.createLogger({
  level: DEFAULT_CONFIG.LOG_LEVEL,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
