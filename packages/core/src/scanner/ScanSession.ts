import type { Finding } from '../types/Finding.js';
import { validateFindings } from '../types/Finding.js';
import type {
  ScanSummary,
  SessionSnapshot,
  SessionState,
} from '../types/ScanResult.js';
import { emptySummary, foldSummary } from '../types/ScanResult.js';
import { AlreadyFinalizedError, InvalidFindingError } from './ScanErrors.js';
import { nextScanId } from './ScanId.js';

export interface ScanSessionOptions {
  /** Explicit id; derived from the creation time when omitted */
  scanId?: string;
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * The record of one scan against one target.
 *
 * Results are append-only and kept in completion order. The summary is a
 * cached projection of the results, updated in the same synchronous step
 * as each append, so no reader ever sees the two disagree.
 */
export class ScanSession {
  readonly scanId: string;
  readonly target: string;
  readonly startTime: Date;

  private readonly now: () => Date;
  private readonly entries: Finding[] = [];
  private counters: ScanSummary = emptySummary();
  private finishedAt: Date | null = null;
  private current: SessionState = 'CREATED';

  constructor(target: string, options: ScanSessionOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.target = target;
    this.startTime = this.now();
    this.scanId = options.scanId ?? nextScanId(this.startTime);
  }

  get state(): SessionState {
    return this.current;
  }

  get endTime(): Date | null {
    return this.finishedAt;
  }

  get summary(): ScanSummary {
    return { ...this.counters };
  }

  get results(): readonly Finding[] {
    return [...this.entries];
  }

  /**
   * Add a batch of findings. The whole batch is validated before anything
   * changes; an invalid batch leaves the session untouched.
   */
  append(findings: readonly Finding[]): void {
    if (this.current === 'FINALIZED') {
      throw new AlreadyFinalizedError(this.scanId, 'append');
    }

    const validation = validateFindings(findings);
    if (!validation.ok) {
      throw new InvalidFindingError(`Rejected batch: ${validation.reason}`);
    }

    const batch = validation.findings.map((finding) => Object.freeze(finding));
    const next = foldSummary(this.counters, batch);

    this.entries.push(...batch);
    this.counters = next;
    this.current = 'RUNNING';
  }

  /**
   * Close the session and return its final snapshot
   */
  finalize(): SessionSnapshot {
    if (this.current === 'FINALIZED') {
      throw new AlreadyFinalizedError(this.scanId, 'finalize');
    }
    this.finishedAt = this.now();
    this.current = 'FINALIZED';
    return this.snapshot();
  }

  /**
   * Scan duration, e.g. "3.42s", or "In progress" while open
   */
  get duration(): string {
    if (!this.finishedAt) return 'In progress';
    const seconds = (this.finishedAt.getTime() - this.startTime.getTime()) / 1000;
    return `${seconds.toFixed(2)}s`;
  }

  /**
   * Deep-frozen copy of the current state
   */
  snapshot(): SessionSnapshot {
    const snapshot: SessionSnapshot = {
      scanId: this.scanId,
      target: this.target,
      startTime: this.startTime.toISOString(),
      endTime: this.finishedAt ? this.finishedAt.toISOString() : null,
      duration: this.duration,
      summary: { ...this.counters },
      results: structuredClone(this.entries),
    };
    return deepFreeze(snapshot);
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
