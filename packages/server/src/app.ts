import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createModuleLogger, logError, wrapError } from '@planboard/core';

const logger = createModuleLogger('server');

export const MESSAGE_HEADER = 'MY-APPLICATION-MESSAGE';
export const DEFAULT_MESSAGE = 'Hello world!';

export interface MessageSources {
  header?: string | undefined;
  query?: unknown;
}

/**
 * Pick the message to echo: a non-empty header wins, then the `message`
 * query parameter (even when empty), then the default greeting
 */
export function resolveMessage({ header, query }: MessageSources): string {
  if (header) {
    return header;
  }
  if (typeof query === 'string') {
    return query;
  }
  // Repeated parameters arrive as an array; the last one counts
  if (Array.isArray(query)) {
    const last: unknown = query[query.length - 1];
    if (typeof last === 'string') {
      return last;
    }
  }
  return DEFAULT_MESSAGE;
}

export function helloHandler(req: Request, res: Response): void {
  const message = resolveMessage({ header: req.get(MESSAGE_HEADER), query: req.query.message });
  logger.debug({ path: req.path, length: message.length }, 'Echoing message');
  res.send(message);
}

// Express recognises error middleware by its four parameters
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  logError(logger, wrapError(error, 'server', `${req.method} ${req.path}`), { path: req.path });
  res.status(500).send('Internal Server Error');
}

export function createApp(): Express {
  const app = express();
  app.get('/hello', helloHandler);
  app.use(errorHandler);
  return app;
}
