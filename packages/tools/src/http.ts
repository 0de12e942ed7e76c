import {
  AlmanacError,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  SchemaError,
  TransientError,
  createLogger,
} from '@almanac/shared';

const log = createLogger('tools:http');

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  /** Per-request bound covering connect, headers and body (default 30s) */
  timeoutMs?: number;
  userAgent?: string;
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchFn;
}

export interface JsonRequest {
  /** Human-readable upstream name used in error messages, e.g. "Geocoding API" */
  service: string;
  url: string;
  params?: Record<string, string | number | boolean>;
  signal?: AbortSignal;
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici reports "fetch failed" and hides the socket error in `cause`
  if (err.cause instanceof Error) return `${err.message} (${err.cause.message})`;
  return err.message;
}

export function buildUrl(base: string, params: JsonRequest['params'] = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a JSON document. Every failure is raised as a taxonomy error:
 * TransientError for timeouts, cancellation, connection failures and non-2xx
 * statuses; SchemaError when the body is not JSON.
 */
export async function fetchJson(request: JsonRequest, options: HttpClientOptions = {}): Promise<unknown> {
  const { service, signal } = request;
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const url = buildUrl(request.url, request.params);

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  let body: string;
  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        'Accept': 'application/json',
      },
      redirect: 'follow',
    });

    if (!response.ok) {
      throw new TransientError(
        `${service} returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
        { status: response.status },
      );
    }

    body = await response.text();
  } catch (err) {
    if (err instanceof AlmanacError) throw err;
    if (timedOut) {
      throw new TransientError(`${service} request timed out after ${timeoutMs / 1000}s.`, { cause: err });
    }
    if (signal?.aborted) {
      throw new TransientError(`${service} request was cancelled.`, { cause: err });
    }
    log.debug(`${service} request failed`, { url, error: describeFetchError(err) });
    throw new TransientError(`Error connecting to ${service}: ${describeFetchError(err)}`, { cause: err });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }

  try {
    return JSON.parse(body);
  } catch (err) {
    throw new SchemaError(`Failed to decode JSON response from ${service}.`, { cause: err });
  }
}
