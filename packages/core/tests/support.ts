import type { Finding, ObservedFinding, Severity } from '../src/types/Finding.js';
import type { ProbeContext, ProbeDescriptor } from '../src/probes/Probe.js';
import { defineProbe } from '../src/probes/Probe.js';
import type { FetchLike } from '../src/probes/TargetClient.js';
import type { Logger } from '../src/utils/logger.js';

export function fakeProbe(
  name: string,
  category: string,
  execute: (context: ProbeContext) => Promise<Finding[]>,
  defaultSeverity: Severity = 'HIGH'
): ProbeDescriptor {
  return defineProbe({ name, category, defaultSeverity, execute });
}

export function passedFinding(test: string, category: string): ObservedFinding {
  return { test, category, status: 'PASSED', description: `${test} passed` };
}

export function vulnerableFinding(
  test: string,
  category: string,
  severity: Severity
): Finding {
  return {
    test,
    category,
    status: 'VULNERABLE',
    severity,
    description: `${test} found an issue`,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolves never; lets a probe hang until it is stopped */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`DEBUG ${message}`),
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}

export interface FetchCall {
  url: string;
  init: RequestInit;
}

/**
 * In-process stand-in for fetch answering every call through `reply`
 */
export function fakeFetch(
  reply: (url: string, init: RequestInit) => Response = () =>
    new Response('not found', { status: 404 })
): { fetch: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  return {
    calls,
    fetch: async (url, init) => {
      calls.push({ url, init });
      return reply(url, init);
    },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function requestBody(call: FetchCall | undefined): unknown {
  const body = call?.init.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}
