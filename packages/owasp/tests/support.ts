import type {
  ProbeContext,
  TargetRequestInit,
  TargetResponse,
} from '@apiprobe/core';

export interface Reply {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
}

export type Route = (url: URL, init: TargetRequestInit) => Reply | undefined;

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
}

/**
 * Probe context whose requests are answered in process. Unrouted
 * requests get a 404.
 */
export function probeContext(
  route: Route,
  options: { target?: string; headers?: Record<string, string> } = {}
): { context: ProbeContext; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const controller = new AbortController();

  const context: ProbeContext = {
    target: new URL(options.target ?? 'https://api.example.test/'),
    headers: options.headers ?? {},
    deadline: Date.now() + 30000,
    signal: controller.signal,
    request: async (input, init = {}): Promise<TargetResponse> => {
      const url = new URL(typeof input === 'string' ? input : input.href);
      const method = (init.method ?? 'GET').toUpperCase();
      requests.push({ url: url.href, method, headers: { ...(init.headers ?? {}) } });
      const reply = route(url, init) ?? {};
      return {
        url: url.href,
        method,
        status: reply.status ?? 404,
        headers: reply.headers ?? {},
        body: reply.body ?? '',
      };
    },
  };

  return { context, requests };
}

/** Route answering the listed paths with 200 and the given body */
export function paths(bodies: Record<string, string>): Route {
  return (url) => {
    const body = bodies[url.pathname];
    return body === undefined ? undefined : { status: 200, body };
  };
}
