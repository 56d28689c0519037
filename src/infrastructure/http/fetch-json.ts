import { z } from 'zod';
import { SourceError } from '../../domain/index.js';

export type FetchFn = typeof fetch;

export interface JsonResponse {
  readonly body: unknown;
  readonly headers: Headers;
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
  error_description: z.string().optional(),
});

/**
 * Pulls a human-readable message out of an API error body.
 * GitHub answers `{ message }`, Google answers `{ error: { message } }`
 * or, on the token endpoint, `{ error, error_description }`.
 */
function readErrorDetail(payload: unknown): string {
  const parsed = errorBodySchema.safeParse(payload);
  if (!parsed.success) return '';

  const { message, error, error_description: description } = parsed.data;
  const candidates = [
    message,
    description,
    typeof error === 'string' ? error : error?.message,
  ];
  for (const candidate of candidates) {
    if (candidate !== undefined && candidate.trim()) return candidate.trim();
  }
  return '';
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === '') return null;
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/**
 * Performs a request and decodes a JSON body.
 *
 * Transport failures, non-2xx statuses and unparseable bodies all
 * surface as SourceError tagged with `source`.
 */
export async function fetchJson(
  source: string,
  fetchFn: FetchFn,
  url: string,
  init?: RequestInit,
): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : 'unknown network error';
    throw new SourceError(source, `request failed: ${reason}`, undefined, { cause: err });
  }

  let body: unknown;
  try {
    body = await readBody(response);
  } catch (err: unknown) {
    if (!response.ok) {
      throw new SourceError(source, `request failed (${response.status})`, response.status);
    }
    throw new SourceError(source, 'cannot parse response body', response.status, { cause: err });
  }

  if (!response.ok) {
    const detail = readErrorDetail(body);
    const message = detail
      ? `request failed (${response.status}): ${detail}`
      : `request failed (${response.status})`;
    throw new SourceError(source, message, response.status);
  }

  return { body, headers: response.headers };
}
