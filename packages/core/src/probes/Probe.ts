import type { Finding, Severity } from '../types/Finding.js';
import type { TargetRequest } from './TargetClient.js';

/**
 * Everything a probe may use while it runs
 */
export interface ProbeContext {
  /** Normalized scan target */
  readonly target: URL;
  /** Operator-supplied headers (authorization, API keys) */
  readonly headers: Readonly<Record<string, string>>;
  /** Epoch milliseconds after which the runner abandons the probe */
  readonly deadline: number;
  /** Aborted on deadline or when the scan abandons in-flight work */
  readonly signal: AbortSignal;
  /** Throttled HTTP client bound to this probe's signal */
  readonly request: TargetRequest;
}

/**
 * A security check: static metadata plus one capability.
 *
 * `execute` must terminate, must only talk to the target through
 * `context.request`, and must not touch state outside its return value.
 */
export interface ProbeDescriptor {
  readonly name: string;
  /** Taxonomy identifier, e.g. API2:2023 */
  readonly category: string;
  readonly defaultSeverity: Severity;
  readonly description?: string;
  execute(context: ProbeContext): Promise<Finding[]>;
}

/**
 * Freeze a probe descriptor
 */
export function defineProbe(probe: ProbeDescriptor): ProbeDescriptor {
  return Object.freeze({ ...probe });
}

/**
 * Category code without the year, e.g. API2:2023 -> API2
 */
export function categoryCode(category: string): string {
  const idx = category.indexOf(':');
  return (idx >= 0 ? category.slice(0, idx) : category).trim();
}
