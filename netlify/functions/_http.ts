import type { HandlerEvent, HandlerResponse } from '@netlify/functions';
import { describeError } from '../../lib/errors';
import type { Logger } from '../../lib/logger';

export type FunctionEvent = Pick<HandlerEvent, 'httpMethod' | 'headers' | 'queryStringParameters'>;

export type FunctionHandler = (event: FunctionEvent) => Promise<HandlerResponse>;

export const json = (statusCode: number, body: unknown): HandlerResponse => ({
  statusCode,
  headers: {
    'content-type': 'application/json'
  },
  body: JSON.stringify(body)
});

export const header = (event: FunctionEvent, name: string): string => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) return value;
  }
  return '';
};

export const withErrorHandling =
  (fn: FunctionHandler, logger: Logger): FunctionHandler =>
  async (event) => {
    try {
      return await fn(event);
    } catch (err) {
      logger.error('Function error', {
        error: describeError(err),
        stack: err instanceof Error ? err.stack : undefined
      });
      return json(500, { message: describeError(err) });
    }
  };
