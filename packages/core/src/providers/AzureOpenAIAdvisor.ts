import type { PlanAdvisor, PlanRequest, ScanPlan } from './PlanAdvisor.js';
import type { ScannerConfig } from '../scanner/ScannerConfig.js';
import { ScannerConfigDefaults } from '../scanner/ScannerConfig.js';
import type { AdvisorOptions } from './ProviderHttp.js';
import { postJson } from './ProviderHttp.js';
import { buildChatBody, extractChatContent } from './OpenAIAdvisor.js';
import { parsePlan } from './PlanParser.js';
import { withRetry, getRetryConfig } from './Retry.js';

/**
 * Azure OpenAI plan advisor. The deployment selects the model.
 */
export class AzureOpenAIAdvisor implements PlanAdvisor {
  readonly name: string;
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(
    endpoint: string,
    deployment: string,
    private readonly apiKey: string,
    private readonly config: ScannerConfig,
    private readonly options: AdvisorOptions = {}
  ) {
    const apiVersion =
      config.azureOpenaiApiVersion ?? ScannerConfigDefaults.DEFAULT_AZURE_API_VERSION;
    const base = endpoint.replace(/\/+$/, '');
    this.url =
      `${base}/openai/deployments/${encodeURIComponent(deployment)}` +
      `/chat/completions?api-version=${encodeURIComponent(apiVersion)}`;
    this.name = `azure-openai:${deployment}`;
    this.timeoutMs = config.advisorTimeoutMs;
  }

  async propose(request: PlanRequest, signal: AbortSignal): Promise<ScanPlan> {
    const body = buildChatBody(undefined, request);
    const retryConfig = getRetryConfig('AZURE_OPENAI', this.config);

    return withRetry(
      retryConfig,
      async () => {
        const response = await postJson({
          provider: 'Azure OpenAI',
          url: this.url,
          headers: { 'api-key': this.apiKey },
          body,
          timeoutMs: this.timeoutMs,
          signal,
          fetch: this.options.fetch,
        });
        return parsePlan(extractChatContent(response, 'Azure OpenAI'));
      },
      undefined,
      signal
    );
  }
}
