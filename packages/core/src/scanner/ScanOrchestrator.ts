import type { ProbeDescriptor } from '../probes/Probe.js';
import type { ProbeRegistry } from '../probes/ProbeRegistry.js';
import type { FetchLike } from '../probes/TargetClient.js';
import { TargetClient } from '../probes/TargetClient.js';
import type { PlanAdvisor, ScanPlan } from '../providers/PlanAdvisor.js';
import { consultAdvisor } from '../providers/PlanAdvisor.js';
import { PROMPT_VERSION } from '../prompt/PromptBuilder.js';
import type {
  ProbeOutcome,
  ScanProgress,
  SessionSnapshot,
} from '../types/ScanResult.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { sanitizeUrl, toError } from '../utils/text.js';
import { normalizeTarget } from '../utils/urls.js';
import type { ScannerConfig } from './ScannerConfig.js';
import { withDefaults } from './ScannerConfig.js';
import { orderProbes } from './PlanOrdering.js';
import { ProbeRunner } from './ProbeRunner.js';
import type { RiskAssessment } from './RiskScorer.js';
import { scoreRisk } from './RiskScorer.js';
import { InvalidTargetError, ScanCancelledError } from './ScanErrors.js';
import { ScanSession } from './ScanSession.js';
import { forEachWithConcurrency } from './WorkerPool.js';

export interface ScanRequest {
  /** Target API URL; https is assumed when no scheme is given */
  target: string;
  headers?: Record<string, string>;
  /** Probe names or category codes; all probes when empty */
  probes?: readonly string[];
  /** Explicit plan; when absent the configured advisor is consulted */
  plan?: ScanPlan;
  /** Cancellation (user interrupt, overall deadline) */
  signal?: AbortSignal;
  onProgress?: (progress: ScanProgress) => void;
}

export type PlanSource = 'request' | 'advisor' | 'registry';

/**
 * How the execution order was chosen
 */
export interface PlanDecision {
  source: PlanSource;
  /** Probe names in submission order */
  order: string[];
  rationale: string | null;
  advisor: string | null;
  /** Why the advisor's plan was not used */
  unavailableReason: string | null;
  /** Version of the prompt sent to the advisor, null when it was not consulted */
  promptVersion: string | null;
}

export interface ScanReport {
  snapshot: SessionSnapshot;
  risk: RiskAssessment;
  plan: PlanDecision;
  /** One entry per probe that was started, in completion order */
  outcomes: ProbeOutcome[];
  cancelled: boolean;
}

export interface ScanOrchestratorOptions {
  config?: Partial<ScannerConfig>;
  advisor?: PlanAdvisor | null;
  logger?: Logger;
  /** Transport for target requests, for tests */
  fetch?: FetchLike;
  /** Clock for session timestamps, for tests */
  now?: () => Date;
}

/**
 * Drives the selected probes through the runner into a session.
 * Each scan gets its own session, client and runner, so independent scans
 * can share one orchestrator.
 */
export class ScanOrchestrator {
  private readonly config: ScannerConfig;
  private readonly advisor: PlanAdvisor | null;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ProbeRegistry,
    private readonly options: ScanOrchestratorOptions = {}
  ) {
    this.config = withDefaults(options.config);
    this.advisor = options.advisor ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  async scan(request: ScanRequest): Promise<ScanReport> {
    const target = normalizeTarget(request.target);
    if (!target) {
      throw new InvalidTargetError(request.target);
    }
    const selected = this.registry.select(request.probes);
    const headers = { ...(request.headers ?? {}) };
    const { signal } = request;
    const progress = (event: ScanProgress): void => {
      this.reportProgress(request.onProgress, event);
    };
    const total = selected.length;

    if (signal?.aborted) {
      throw new ScanCancelledError();
    }

    progress({ phase: 'planning', probe: null, completed: 0, total });
    const { probes, decision } = await this.resolveOrder(
      target,
      headers,
      selected,
      request
    );

    if (signal?.aborted) {
      throw new ScanCancelledError();
    }

    const session = new ScanSession(target.href, { now: this.options.now });
    this.logger.info(
      `Scan ${session.scanId} started: ${sanitizeUrl(target.href)}, ${total} probe(s), order from ${decision.source}`
    );

    const client = new TargetClient({
      fetch: this.options.fetch,
      maxRequestsPerSecond: this.config.maxRequestsPerSecond,
      logger: this.logger,
    });
    const runner = new ProbeRunner({
      timeoutMs: this.config.probeTimeoutMs,
      client,
      logger: this.logger,
    });

    const abandon = new AbortController();
    let graceTimer: NodeJS.Timeout | undefined;
    const onCancel = (): void => {
      this.logger.warn(
        `Scan ${session.scanId} cancelled; waiting up to ${this.config.cancelGraceMs}ms for in-flight probes`
      );
      graceTimer = setTimeout(() => abandon.abort(), this.config.cancelGraceMs);
    };
    signal?.addEventListener('abort', onCancel, { once: true });

    const outcomes: ProbeOutcome[] = [];
    let completed = 0;

    try {
      await forEachWithConcurrency(
        probes,
        this.config.concurrency,
        async (probe: ProbeDescriptor) => {
          progress({ phase: 'scanning', probe: probe.name, completed, total });
          const outcome = await runner.run(probe, {
            target,
            headers,
            abandonSignal: abandon.signal,
          });
          outcomes.push(outcome);
          if (outcome.status !== 'abandoned') {
            session.append(outcome.findings);
          }
          completed += 1;
          progress({ phase: 'scanning', probe: probe.name, completed, total });
        },
        signal
      );
    } finally {
      signal?.removeEventListener('abort', onCancel);
      clearTimeout(graceTimer);
    }

    progress({ phase: 'completing', probe: null, completed, total });
    const snapshot = session.finalize();
    const risk = scoreRisk(snapshot.summary);
    const cancelled = signal?.aborted ?? false;

    this.logger.info(
      `Scan ${snapshot.scanId} ${cancelled ? 'cancelled' : 'completed'} in ${snapshot.duration}: ` +
        `${snapshot.summary.vulnerabilitiesFound} vulnerabilities, risk ${risk.score} (${risk.level})`
    );

    return { snapshot, risk, plan: decision, outcomes, cancelled };
  }

  private reportProgress(
    listener: ScanRequest['onProgress'],
    event: ScanProgress
  ): void {
    if (!listener) return;
    try {
      listener(event);
    } catch (error) {
      this.logger.warn(`Progress listener failed: ${toError(error).message}`);
    }
  }

  private async resolveOrder(
    target: URL,
    headers: Record<string, string>,
    selected: ProbeDescriptor[],
    request: ScanRequest
  ): Promise<{ probes: ProbeDescriptor[]; decision: PlanDecision }> {
    const registryOrder = (
      reason: string | null,
      promptVersion: string | null
    ): { probes: ProbeDescriptor[]; decision: PlanDecision } => ({
      probes: selected,
      decision: {
        source: 'registry',
        order: selected.map((probe) => probe.name),
        rationale: null,
        advisor: this.advisor?.name ?? null,
        unavailableReason: reason,
        promptVersion,
      },
    });

    if (request.plan) {
      return this.applyPlan(selected, request.plan, 'request', null, null);
    }

    if (!this.advisor) {
      return registryOrder(null, null);
    }

    const result = await consultAdvisor(
      this.advisor,
      {
        target: target.href,
        headers,
        probes: selected.map((probe) => ({
          name: probe.name,
          category: probe.category,
          description: probe.description,
        })),
      },
      {
        timeoutMs: this.config.advisorTimeoutMs,
        signal: request.signal,
        logger: this.logger,
      }
    );

    if (result.kind === 'unavailable') {
      this.logger.warn(
        `Plan advisor ${result.advisor} unavailable (${result.reason}); using registry order`
      );
      return registryOrder(result.reason, PROMPT_VERSION);
    }

    return this.applyPlan(
      selected,
      result.plan,
      'advisor',
      result.advisor,
      PROMPT_VERSION
    );
  }

  private applyPlan(
    selected: ProbeDescriptor[],
    plan: ScanPlan,
    source: PlanSource,
    advisor: string | null,
    promptVersion: string | null
  ): { probes: ProbeDescriptor[]; decision: PlanDecision } {
    const { probes, ignored } = orderProbes(
      this.registry,
      selected,
      plan.priorityOrder
    );
    if (ignored.length > 0) {
      this.logger.debug(`Plan entries ignored: ${ignored.join(', ')}`);
    }
    return {
      probes,
      decision: {
        source,
        order: probes.map((probe) => probe.name),
        rationale: plan.rationale || null,
        advisor,
        unavailableReason: null,
        promptVersion,
      },
    };
  }
}
