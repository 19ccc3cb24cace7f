/**
 * Route-handler plumbing: request body parsing, the single place errors are
 * turned into HTTP responses, and per-request logging and metrics.
 */
import { NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { DataSourceError, NotFoundError } from './errors';
import { logger } from './logger';
import type { Logger } from './logger';
import { metrics } from './metrics';
import { ValidationError } from './validation';
import type { ParamSource } from './validation';

export type ErrorBody = { error: string };

/**
 * Parameters may arrive as an HTML form post, a JSON object or, failing
 * both, the query string.
 */
export async function readParams(request: Request): Promise<ParamSource> {
  const contentType = request.headers.get('content-type') ?? '';

  if (contentType.includes('application/json')) {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      throw new ValidationError('body', 'Request body must be valid JSON');
    }
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new ValidationError('body', 'Request body must be a JSON object');
    }
    return new Map<string, unknown>(Object.entries(body));
  }

  if (
    contentType.includes('application/x-www-form-urlencoded') ||
    contentType.includes('multipart/form-data')
  ) {
    try {
      return await request.formData();
    } catch {
      throw new ValidationError('body', 'Request body is not valid form data');
    }
  }

  return new URL(request.url).searchParams;
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

export function toErrorResponse(error: unknown, log: Logger): NextResponse<ErrorBody> {
  if (error instanceof ValidationError) {
    log.debug('Rejected request parameters', { field: error.field, reason: error.message });
    return NextResponse.json({ error: error.message }, { status: 400 });
  }
  if (error instanceof NotFoundError) {
    log.info(error.message);
    return NextResponse.json({ error: error.message }, { status: 404 });
  }
  if (error instanceof DataSourceError) {
    log.error('Data source failure', error, { source: error.source, cause: describeCause(error.cause) });
    return NextResponse.json({ error: 'Data source unavailable' }, { status: 500 });
  }

  log.error('Unhandled error', error);
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}

/**
 * Runs a route body with a request-scoped logger, maps any thrown error and
 * records latency for /api/metrics.
 */
export async function handleRoute(
  method: string,
  endpoint: string,
  handler: (log: Logger) => Promise<Response>,
): Promise<Response> {
  const startMs = Date.now();
  const requestId = uuidv4();
  const log = logger.child({ requestId, endpoint });

  let response: Response;
  try {
    response = await handler(log);
  } catch (error) {
    response = toErrorResponse(error, log);
  }

  const durationMs = Date.now() - startMs;
  metrics.record(method, endpoint, durationMs, response.status >= 500);
  response.headers.set('X-Request-Id', requestId);
  log.debug('Request completed', { status: response.status, durationMs });
  return response;
}
