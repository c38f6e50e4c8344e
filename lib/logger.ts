import winston from 'winston';

export type { Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'simple';
  silent?: boolean;
}

export const createLogger = ({ level = 'info', format = 'json', silent = false }: LoggerOptions = {}) =>
  winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      format === 'json' ? winston.format.json() : winston.format.simple()
    ),
    defaultMeta: { service: 'job-management' },
    transports: [new winston.transports.Console()]
  });
