/**
 * Inspection helpers for errors thrown by got
 *
 * got's HTTPError/RequestError/TimeoutError share a shape (`response`, `code`, `name`),
 * so failures are classified structurally rather than by class.
 */

const TRANSIENT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN'
]);

export interface HttpFailure {
  status: number | null;
  transient: boolean;
  retryAfterMs?: number;
  message: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric) * 1000;
  }
  const parsedDate = Date.parse(value);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - now);
  }
  return undefined;
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function describeHttpFailure(error: unknown): HttpFailure {
  const message = error instanceof Error ? error.message : String(error);

  if (!isRecord(error)) {
    return { status: null, transient: false, message };
  }

  const response = error.response;
  if (isRecord(response) && typeof response.statusCode === 'number') {
    const status = response.statusCode;
    const headers = isRecord(response.headers) ? response.headers : {};
    return {
      status,
      transient: isTransientStatus(status),
      retryAfterMs: status === 429 ? parseRetryAfter(headers['retry-after']) : undefined,
      message
    };
  }

  // Unparseable body: retrying will not fix it
  if (error.name === 'ParseError') {
    return { status: null, transient: false, message };
  }

  const code = typeof error.code === 'string' ? error.code : '';
  const transient = error.name === 'TimeoutError' || error.name === 'RequestError' || TRANSIENT_CODES.has(code);
  return { status: null, transient, message };
}

/**
 * Read the OAuth `error` field from a failed accounts-service response body
 */
export function oauthErrorCode(error: unknown): string | undefined {
  if (!isRecord(error) || !isRecord(error.response)) {
    return undefined;
  }
  const body = error.response.body;
  if (typeof body !== 'string') {
    return isRecord(body) && typeof body.error === 'string' ? body.error : undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return isRecord(parsed) && typeof parsed.error === 'string' ? parsed.error : undefined;
  } catch {
    return undefined;
  }
}
