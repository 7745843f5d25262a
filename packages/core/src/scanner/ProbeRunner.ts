import type { Finding } from '../types/Finding.js';
import { validateFindings } from '../types/Finding.js';
import type { ProbeOutcome, ProbeOutcomeStatus } from '../types/ScanResult.js';
import type { ProbeContext, ProbeDescriptor } from '../probes/Probe.js';
import type { TargetClient } from '../probes/TargetClient.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { sanitizeUrl, summarizeError, toError } from '../utils/text.js';
import { raceAbort } from '../utils/timers.js';
import { ProbeExecutionError } from './ScanErrors.js';

export interface ProbeRunnerOptions {
  /** Per-probe deadline */
  timeoutMs: number;
  client: TargetClient;
  logger?: Logger;
}

export interface ProbeRunRequest {
  target: URL;
  headers: Readonly<Record<string, string>>;
  /** Aborting this abandons the run; its output is discarded */
  abandonSignal?: AbortSignal;
}

type StopReason = 'timeout' | 'abandoned';

const ERROR_RECOMMENDATION =
  'The check could not be completed. Verify the target is reachable and re-run the scan.';

/**
 * Runs exactly one probe under isolation. Whatever happens inside the
 * probe, the caller gets an outcome back; failures and timeouts become a
 * single ERROR finding.
 */
export class ProbeRunner {
  private readonly logger: Logger;

  constructor(private readonly options: ProbeRunnerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async run(
    probe: ProbeDescriptor,
    request: ProbeRunRequest
  ): Promise<ProbeOutcome> {
    const startedAt = Date.now();
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const stopped: { reason: StopReason | null } = { reason: null };

    const stop = (reason: StopReason, message: string): void => {
      if (controller.signal.aborted) return;
      stopped.reason = reason;
      controller.abort(new Error(message));
    };

    const timer = setTimeout(
      () => stop('timeout', `Probe timed out after ${timeoutMs}ms`),
      timeoutMs
    );
    const onAbandon = (): void => stop('abandoned', 'Probe abandoned');
    request.abandonSignal?.addEventListener('abort', onAbandon, { once: true });
    if (request.abandonSignal?.aborted) onAbandon();

    const context: ProbeContext = {
      target: request.target,
      headers: request.headers,
      deadline: startedAt + timeoutMs,
      signal: controller.signal,
      request: this.options.client.forSignal(controller.signal),
    };

    const finish = (
      status: ProbeOutcomeStatus,
      findings: Finding[]
    ): ProbeOutcome => ({
      probe: probe.name,
      category: probe.category,
      status,
      findings,
      durationMs: Date.now() - startedAt,
    });

    try {
      const work = Promise.resolve().then(() => probe.execute(context));
      const raw: unknown = await raceAbort(work, controller.signal);
      const validation = validateFindings(raw);
      if (!validation.ok) {
        throw new ProbeExecutionError(
          `Malformed findings: ${validation.reason}`,
          probe.name
        );
      }
      return finish('completed', validation.findings);
    } catch (error) {
      if (stopped.reason === 'abandoned') {
        this.logger.debug(`Probe ${probe.name} abandoned`);
        return finish('abandoned', []);
      }

      const timedOut = stopped.reason === 'timeout';
      const failure = timedOut
        ? new ProbeExecutionError(`Probe timed out after ${timeoutMs}ms`, probe.name)
        : new ProbeExecutionError(
            summarizeError(error, Object.values(request.headers)),
            probe.name,
            toError(error)
          );
      const status: ProbeOutcomeStatus = timedOut ? 'timed_out' : 'failed';

      this.logger.warn(`Probe ${probe.name} ${status}: ${failure.message}`);
      return finish(status, [errorFinding(probe, request.target, failure.message)]);
    } finally {
      clearTimeout(timer);
      request.abandonSignal?.removeEventListener('abort', onAbandon);
      // Lets the probe's own requests stop after it has returned or failed
      if (!controller.signal.aborted) controller.abort(new Error('Probe finished'));
    }
  }
}

/**
 * Synthetic finding recording that a probe could not complete
 */
export function errorFinding(
  probe: Pick<ProbeDescriptor, 'name' | 'category'>,
  target: URL,
  summary: string
): Finding {
  return {
    test: probe.name,
    category: probe.category,
    status: 'ERROR',
    url: sanitizeUrl(target.href),
    description: `Probe failed: ${summary}`,
    recommendation: ERROR_RECOMMENDATION,
  };
}
