import { z } from 'zod';

/**
 * Outcome of a single probe observation
 */
export const FINDING_STATUSES = ['VULNERABLE', 'PASSED', 'INFO', 'ERROR'] as const;
export type FindingStatus = (typeof FINDING_STATUSES)[number];

/**
 * Severity levels, ordered from most to least severe
 */
export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'] as const;
export type Severity = (typeof SEVERITIES)[number];

interface FindingFields {
  /** Name of the probe that produced the observation */
  test: string;
  /** Taxonomy identifier (e.g., API2:2023) */
  category: string;
  /** Request URL, absent for aggregate-level findings */
  url?: string;
  /** Request method */
  method?: string;
  description: string;
  /** Raw observation, displayed only */
  evidence?: string;
  recommendation?: string;
}

/**
 * A confirmed weakness. Only vulnerable findings carry a severity.
 */
export interface VulnerableFinding extends FindingFields {
  status: 'VULNERABLE';
  severity: Severity;
}

/**
 * A passed check, an informational note or a probe failure
 */
export interface ObservedFinding extends FindingFields {
  status: Exclude<FindingStatus, 'VULNERABLE'>;
  severity?: never;
}

export type Finding = VulnerableFinding | ObservedFinding;

const findingFields = {
  test: z.string().min(1),
  category: z.string(),
  url: z.string().optional(),
  method: z.string().optional(),
  description: z.string(),
  evidence: z.string().optional(),
  recommendation: z.string().optional(),
};

export const FindingSchema = z.discriminatedUnion('status', [
  z
    .object({
      ...findingFields,
      status: z.literal('VULNERABLE'),
      severity: z.enum(SEVERITIES),
    })
    .strict(),
  z
    .object({
      ...findingFields,
      status: z.enum(['PASSED', 'INFO', 'ERROR']),
      severity: z.undefined().optional(),
    })
    .strict(),
]);

export type FindingValidation =
  | { ok: true; findings: Finding[] }
  | { ok: false; reason: string };

/**
 * Validate an untrusted batch of findings. Returns parsed copies on success;
 * an explicit `severity: undefined` on a non-vulnerable finding is dropped.
 */
export function validateFindings(value: unknown): FindingValidation {
  const result = z.array(FindingSchema).safeParse(value);
  if (!result.success) {
    return { ok: false, reason: formatIssues(result.error) };
  }
  for (const finding of result.data) {
    if (finding.status !== 'VULNERABLE') {
      delete finding.severity;
    }
  }
  return { ok: true, findings: result.data };
}

/**
 * Render zod issues as a single line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Group vulnerable findings by severity
 */
export function groupBySeverity(
  findings: readonly Finding[]
): Record<Severity, VulnerableFinding[]> {
  const grouped: Record<Severity, VulnerableFinding[]> = {
    CRITICAL: [],
    HIGH: [],
    MEDIUM: [],
    LOW: [],
    INFO: [],
  };
  for (const finding of findings) {
    if (finding.status === 'VULNERABLE') {
      grouped[finding.severity].push(finding);
    }
  }
  return grouped;
}
