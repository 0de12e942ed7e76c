import { MAX_ERROR_LENGTH, ProviderError, errorMessage } from '@almanac/shared';

/** Timeout for a single chat request (2 minutes) */
export const CHAT_TIMEOUT_MS = 120_000;

export interface PostJsonOptions {
  headers: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * POST a JSON body to a provider endpoint and return the decoded response.
 * HTTP and transport failures become ProviderError; a caller abort is rethrown
 * as-is so the agent loop can tell cancellation apart from provider trouble.
 */
export async function postJson(
  providerId: string,
  label: string,
  url: string,
  body: unknown,
  options: PostJsonOptions,
): Promise<unknown> {
  const { signal } = options;
  const timeoutMs = options.timeoutMs ?? CHAT_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: options.headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderError(`${label} API error ${response.status}: ${errorText.slice(0, MAX_ERROR_LENGTH)}`, providerId);
    }

    return await response.json();
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    if (signal?.aborted) throw err;
    if (timedOut) {
      throw new ProviderError(`${label} API request timed out after ${timeoutMs / 1000}s`, providerId, { cause: err });
    }
    throw new ProviderError(`${label} API request failed: ${errorMessage(err)}`, providerId, { cause: err });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

/** Decode tool-call arguments; anything but a JSON object becomes `{}` */
export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // the tool reports the missing fields back to the model
    return {};
  }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}
