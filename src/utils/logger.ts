import dotenv from 'dotenv';
import winston from 'winston';

// Imported ahead of the config module, so `.env` has to be read here too.
dotenv.config();

const level = process.env.LOG_LEVEL || 'info';

export const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'term-sales-agent' },
  transports: [new winston.transports.Console()],
});

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
