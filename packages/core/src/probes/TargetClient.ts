import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { sanitizeUrl } from '../utils/text.js';
import { sleep } from '../utils/timers.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TargetRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface TargetResponse {
  url: string;
  method: string;
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Response text, capped */
  body: string;
}

export type TargetRequest = (
  url: string | URL,
  init?: TargetRequestInit
) => Promise<TargetResponse>;

export interface TargetClientOptions {
  fetch?: FetchLike;
  /** Request-rate ceiling shared by every probe of a scan; 0 disables it */
  maxRequestsPerSecond?: number;
  /** Characters of response text kept per request */
  maxBodyChars?: number;
  logger?: Logger;
}

const DEFAULT_MAX_BODY_CHARS = 64 * 1024;

/**
 * HTTP access to the scan target. Requests from all probes share one
 * schedule so the target never sees more than the configured rate.
 * Redirects are not followed and nothing is retried; a 429 reaches the
 * probe like any other response.
 */
export class TargetClient {
  private readonly fetchImpl: FetchLike;
  private readonly intervalMs: number;
  private readonly maxBodyChars: number;
  private readonly logger: Logger;
  private nextSlotAt = 0;
  private sent = 0;

  constructor(options: TargetClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    const rate = options.maxRequestsPerSecond ?? 0;
    this.intervalMs = rate > 0 ? 1000 / rate : 0;
    this.maxBodyChars = options.maxBodyChars ?? DEFAULT_MAX_BODY_CHARS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Number of requests handed to fetch so far
   */
  get requestCount(): number {
    return this.sent;
  }

  /**
   * Request function for one probe run
   */
  forSignal(signal: AbortSignal): TargetRequest {
    return (url, init) => this.send(url, init ?? {}, signal);
  }

  private async send(
    url: string | URL,
    init: TargetRequestInit,
    signal: AbortSignal
  ): Promise<TargetResponse> {
    await this.waitForSlot(signal);
    signal.throwIfAborted();

    const href = typeof url === 'string' ? url : url.href;
    const method = (init.method ?? 'GET').toUpperCase();
    this.sent += 1;
    this.logger.debug(`${method} ${sanitizeUrl(href)}`);

    const response = await this.fetchImpl(href, {
      method,
      headers: init.headers,
      body: init.body,
      redirect: 'manual',
      signal,
    });

    const body = await this.readBody(response);
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return {
      url: href,
      method,
      status: response.status,
      headers,
      body,
    };
  }

  /**
   * Read response text up to the body cap, then cancel the rest of the stream
   */
  private async readBody(response: Response): Promise<string> {
    if (!response.body) return '';
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let text = '';

    while (text.length < this.maxBodyChars) {
      const chunk = await reader.read();
      if (chunk.done) {
        return (text + decoder.decode()).slice(0, this.maxBodyChars);
      }
      text += decoder.decode(chunk.value, { stream: true });
    }

    await reader.cancel();
    return text.slice(0, this.maxBodyChars);
  }

  private async waitForSlot(signal: AbortSignal): Promise<void> {
    if (this.intervalMs === 0) return;
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    if (slot > now) {
      await sleep(slot - now, signal);
    }
  }
}
