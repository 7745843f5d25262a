import { z } from 'zod';
import type { PlanAdvisor, PlanRequest, ScanPlan } from './PlanAdvisor.js';
import { AdvisorException } from './PlanAdvisor.js';
import type { ScannerConfig } from '../scanner/ScannerConfig.js';
import { ScannerConfigDefaults } from '../scanner/ScannerConfig.js';
import { PLAN_SYSTEM_PROMPT, buildPlanPrompt } from '../prompt/PromptBuilder.js';
import type { AdvisorOptions } from './ProviderHttp.js';
import { expectShape, postJson } from './ProviderHttp.js';
import { parsePlan } from './PlanParser.js';
import { withRetry, getRetryConfig } from './Retry.js';

const ChatSchema = z.object({
  message: z.object({ content: z.string().optional() }),
});

/**
 * Ollama plan advisor (self-hosted LLM)
 */
export class OllamaAdvisor implements PlanAdvisor {
  readonly name: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly modelName: string,
    private readonly config: ScannerConfig,
    private readonly options: AdvisorOptions = {}
  ) {
    this.name = `ollama:${modelName}`;
    this.endpoint = (
      config.ollamaEndpoint ?? ScannerConfigDefaults.DEFAULT_OLLAMA_ENDPOINT
    ).replace(/\/+$/, '');
    this.timeoutMs = config.advisorTimeoutMs;
  }

  async propose(request: PlanRequest, signal: AbortSignal): Promise<ScanPlan> {
    const body = {
      model: this.modelName,
      messages: [
        { role: 'system', content: PLAN_SYSTEM_PROMPT },
        { role: 'user', content: buildPlanPrompt(request) },
      ],
      format: 'json',
      stream: false,
      options: {
        temperature: 0.3,
        num_predict: 1024,
      },
    };

    const retryConfig = getRetryConfig('OLLAMA', this.config);

    return withRetry(
      retryConfig,
      async () => {
        const response = await postJson({
          provider: 'Ollama',
          url: `${this.endpoint}/api/chat`,
          headers: {},
          body,
          timeoutMs: this.timeoutMs,
          signal,
          fetch: this.options.fetch,
        });
        const data = expectShape(ChatSchema, response, 'Ollama');
        const content = data.message.content;
        if (!content) {
          throw new AdvisorException('Ollama response missing content');
        }
        return parsePlan(content);
      },
      undefined,
      signal
    );
  }
}
