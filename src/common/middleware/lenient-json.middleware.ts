import { Logger } from '@nestjs/common';
import { ErrorRequestHandler, RequestHandler, json } from 'express';

const logger = new Logger('LenientJson');

/**
 * body-parser rejections carry a string `type` (entity.parse.failed,
 * entity.too.large, charset.unsupported, encoding.unsupported, ...) and a 4xx status.
 */
export function isBodyParseError(error: unknown): error is { type: string; status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Turns any body parser rejection into an empty body instead of a 4xx;
 * every other error goes on to the next handler.
 */
export const resetMalformedBody: ErrorRequestHandler = (error: unknown, request, _response, next) => {
  if (!isBodyParseError(error)) {
    next(error);
    return;
  }
  logger.warn(`Unreadable body on ${request.method} ${request.originalUrl} (${error.type}), treating it as {}`);
  request.body = {};
  next();
};

/** Replaces an absent or non-object body (array, string, null) with {} */
export const ensureObjectBody: RequestHandler = (request, _response, next) => {
  const body: unknown = request.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    request.body = {};
  }
  next();
};

/**
 * JSON body parsing that never rejects a request: the parser itself, its
 * error reset and the object guard, in mounting order.
 *
 * @example
 * ```typescript
 * const app = await NestFactory.create(AppModule, { bodyParser: false });
 * app.use(...lenientJson());
 * ```
 */
export function lenientJson(): [RequestHandler, ErrorRequestHandler, RequestHandler] {
  return [json(), resetMalformedBody, ensureObjectBody];
}
