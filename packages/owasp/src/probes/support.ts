import type {
  Finding,
  ObservedFinding,
  ProbeContext,
  ProbeDescriptor,
  Severity,
  TargetResponse,
  VulnerableFinding,
} from '@apiprobe/core';
import { defineProbe, resolvePath, truncateText } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';

export interface FindingDraft {
  url?: string;
  method?: string;
  description: string;
  evidence?: string;
  recommendation?: string;
}

/**
 * Finding constructors bound to one probe and its category
 */
export interface FindingKit {
  vulnerable(draft: FindingDraft, severity?: Severity): VulnerableFinding;
  passed(draft: FindingDraft): ObservedFinding;
  info(draft: FindingDraft): ObservedFinding;
}

export function findingKit(name: string, category: OwaspCategory): FindingKit {
  const base = (draft: FindingDraft) => ({
    test: name,
    category: category.id,
    url: draft.url,
    method: draft.method,
    description: draft.description,
    evidence:
      draft.evidence === undefined ? undefined : truncateText(draft.evidence, 300),
  });

  return {
    vulnerable: (draft, severity = category.severity) => ({
      ...base(draft),
      status: 'VULNERABLE',
      severity,
      recommendation: draft.recommendation ?? category.recommendation,
    }),
    passed: (draft) => ({ ...base(draft), status: 'PASSED' }),
    info: (draft) => ({
      ...base(draft),
      status: 'INFO',
      recommendation: draft.recommendation,
    }),
  };
}

export type ProbeBody = (
  context: ProbeContext,
  kit: FindingKit
) => Promise<Finding[]>;

/**
 * Declare a probe for a catalog category
 */
export function categoryProbe(
  name: string,
  category: OwaspCategory,
  description: string,
  body: ProbeBody
): ProbeDescriptor {
  const kit = findingKit(name, category);
  return defineProbe({
    name,
    category: category.id,
    defaultSeverity: category.severity,
    description,
    execute: (context) => body(context, kit),
  });
}

const CREDENTIAL_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'x-api-key',
  'api-key',
  'x-auth-token',
]);

/**
 * Scan headers minus anything that carries credentials
 */
export function withoutCredentials(
  headers: Readonly<Record<string, string>>
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(
      ([name]) => !CREDENTIAL_HEADERS.has(name.toLowerCase())
    )
  );
}

export function hasCredentials(headers: Readonly<Record<string, string>>): boolean {
  return Object.keys(headers).some((name) =>
    CREDENTIAL_HEADERS.has(name.toLowerCase())
  );
}

/**
 * GET a path on the target's origin
 */
export function getPath(
  context: ProbeContext,
  path: string,
  headers: Record<string, string> = { ...context.headers }
): Promise<TargetResponse> {
  return context.request(resolvePath(context.target, path), {
    method: 'GET',
    headers,
  });
}

export function isSuccess(response: TargetResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Parse a JSON body; undefined when the body is not JSON
 */
export function parseJsonBody(response: TargetResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch {
    return undefined;
  }
}
