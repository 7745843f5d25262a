import type { Finding } from './Finding.js';

/**
 * Counters derived from a session's results
 */
export interface ScanSummary {
  /** Number of findings recorded */
  total: number;
  /** Findings with status VULNERABLE */
  vulnerabilitiesFound: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
  /** Findings with status INFO */
  info: number;
  /** Findings with status PASSED */
  passed: number;
  /** Findings with status ERROR */
  errors: number;
}

export function emptySummary(): ScanSummary {
  return {
    total: 0,
    vulnerabilitiesFound: 0,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    info: 0,
    passed: 0,
    errors: 0,
  };
}

/**
 * Fold a batch of findings into a summary, returning a new summary
 */
export function foldSummary(
  summary: ScanSummary,
  findings: readonly Finding[]
): ScanSummary {
  const next = { ...summary, total: summary.total + findings.length };

  for (const finding of findings) {
    switch (finding.status) {
      case 'VULNERABLE':
        next.vulnerabilitiesFound += 1;
        switch (finding.severity) {
          case 'CRITICAL':
            next.critical += 1;
            break;
          case 'HIGH':
            next.high += 1;
            break;
          case 'MEDIUM':
            next.medium += 1;
            break;
          case 'LOW':
            next.low += 1;
            break;
          case 'INFO':
            break;
        }
        break;
      case 'INFO':
        next.info += 1;
        break;
      case 'PASSED':
        next.passed += 1;
        break;
      case 'ERROR':
        next.errors += 1;
        break;
    }
  }

  return next;
}

/**
 * Recompute a summary from results alone
 */
export function summarize(findings: readonly Finding[]): ScanSummary {
  return foldSummary(emptySummary(), findings);
}

/**
 * Session lifecycle
 */
export type SessionState = 'CREATED' | 'RUNNING' | 'FINALIZED';

/**
 * Immutable, serializable view of a session. This is the only input
 * report exporters receive.
 */
export interface SessionSnapshot {
  readonly scanId: string;
  readonly target: string;
  /** ISO 8601 UTC */
  readonly startTime: string;
  /** ISO 8601 UTC, null while the session is open */
  readonly endTime: string | null;
  /** Seconds with two decimals (e.g., "3.42s"), or "In progress" */
  readonly duration: string;
  readonly summary: Readonly<ScanSummary>;
  readonly results: readonly Finding[];
}

/**
 * How a single probe run ended
 */
export type ProbeOutcomeStatus = 'completed' | 'failed' | 'timed_out' | 'abandoned';

export interface ProbeOutcome {
  probe: string;
  category: string;
  status: ProbeOutcomeStatus;
  findings: Finding[];
  durationMs: number;
}

/**
 * Scan phase
 */
export type ScanPhase = 'planning' | 'scanning' | 'completing';

/**
 * Progress update during a scan
 */
export interface ScanProgress {
  phase: ScanPhase;
  /** Probe that just started or finished, if any */
  probe: string | null;
  /** Number of probes that have settled */
  completed: number;
  /** Number of probes selected */
  total: number;
}
