/**
 * Shared application logger. JSON lines on the console; level from LOG_LEVEL.
 * Silent under NODE_ENV=test so jest output stays readable.
 */
import winston from 'winston';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'live-transcription' },
  transports: [new winston.transports.Console()],
});
