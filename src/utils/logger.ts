import winston from 'winston';
import { config } from './config.js';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
});

const line = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${details}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize({ all: true }), line),
  }),
];

if (config.logging.file) {
  transports.push(new winston.transports.File({ filename: config.logging.file }));
}

export const logger = winston.createLogger({
  level: config.logging.level,
  levels,
  format: winston.format.combine(winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), line),
  transports,
});
