import { z } from 'zod';
import type { FetchLike } from '../probes/TargetClient.js';
import { formatIssues } from '../types/Finding.js';
import { AdvisorException } from './PlanAdvisor.js';

export interface AdvisorOptions {
  /** Transport override, for tests */
  fetch?: FetchLike;
}

export interface JsonPost {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: object;
  timeoutMs: number;
  signal: AbortSignal;
  fetch?: FetchLike;
}

/**
 * POST a JSON body and return the parsed JSON answer
 */
export async function postJson(request: JsonPost): Promise<unknown> {
  const fetchImpl: FetchLike = request.fetch ?? ((input, init) => fetch(input, init));
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  const onAbort = (): void => controller.abort();
  request.signal.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetchImpl(request.url, {
      method: 'POST',
      headers: {
        ...request.headers,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      const snippet = text.slice(0, 400);
      throw new AdvisorException(
        `${request.provider} call failed with status ${response.status}: ${snippet}`
      );
    }

    const data: unknown = await response.json();
    return data;
  } finally {
    clearTimeout(timeout);
    request.signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Validate a provider answer against the shape the provider documents
 */
export function expectShape<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  provider: string
): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new AdvisorException(
      `${provider} response has an unexpected shape: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}
