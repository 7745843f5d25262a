import { z } from 'zod';
import { formatIssues } from '../types/Finding.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { summarizeError } from '../utils/text.js';
import { raceAbort } from '../utils/timers.js';

/**
 * Advisory execution order over probe names or category codes
 */
export interface ScanPlan {
  priorityOrder: string[];
  rationale: string;
}

export const ScanPlanSchema = z.object({
  priorityOrder: z.array(z.string()),
  rationale: z.string(),
});

/**
 * Probe metadata shown to the advisor
 */
export interface ProbeBrief {
  name: string;
  category: string;
  description?: string;
}

export interface PlanRequest {
  target: string;
  headers: Readonly<Record<string, string>>;
  probes: ProbeBrief[];
}

/**
 * Interface for plan advisors (LLM providers)
 */
export interface PlanAdvisor {
  /** Provider and model, for logs and reports */
  readonly name: string;

  /**
   * Propose a priority order for the given probes
   */
  propose(request: PlanRequest, signal: AbortSignal): Promise<ScanPlan>;
}

/**
 * Exception thrown by plan advisors
 */
export class AdvisorException extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AdvisorException';
  }
}

export type AdvisorResult =
  | { kind: 'plan'; advisor: string; plan: ScanPlan }
  | { kind: 'unavailable'; advisor: string; reason: string };

export interface ConsultOptions {
  timeoutMs: number;
  /** Scan cancellation */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Ask an advisor for a plan, once, within a deadline. Never throws:
 * timeouts, cancellation, transport failures and unusable answers all
 * come back as `unavailable`.
 */
export async function consultAdvisor(
  advisor: PlanAdvisor,
  request: PlanRequest,
  options: ConsultOptions
): Promise<AdvisorResult> {
  const logger = options.logger ?? silentLogger;
  const unavailable = (reason: string): AdvisorResult => {
    logger.debug(`Advisor ${advisor.name} unavailable: ${reason}`);
    return { kind: 'unavailable', advisor: advisor.name, reason };
  };

  if (options.signal?.aborted) {
    return unavailable('scan cancelled');
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`timed out after ${options.timeoutMs}ms`)),
    options.timeoutMs
  );
  const onCancel = (): void => controller.abort(new Error('scan cancelled'));
  options.signal?.addEventListener('abort', onCancel, { once: true });

  try {
    const work = Promise.resolve().then(() =>
      advisor.propose(request, controller.signal)
    );
    const proposed: unknown = await raceAbort(work, controller.signal);
    const parsed = ScanPlanSchema.safeParse(proposed);
    if (!parsed.success) {
      return unavailable(`invalid plan: ${formatIssues(parsed.error)}`);
    }
    return { kind: 'plan', advisor: advisor.name, plan: parsed.data };
  } catch (error) {
    return unavailable(summarizeError(error, Object.values(request.headers)));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCancel);
  }
}
