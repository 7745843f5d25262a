import { z } from 'zod';
import type { PlanAdvisor, PlanRequest, ScanPlan } from './PlanAdvisor.js';
import { AdvisorException } from './PlanAdvisor.js';
import type { ScannerConfig } from '../scanner/ScannerConfig.js';
import {
  PLAN_SYSTEM_PROMPT,
  JSON_PREFILL,
  buildPlanPrompt,
} from '../prompt/PromptBuilder.js';
import type { AdvisorOptions } from './ProviderHttp.js';
import { expectShape, postJson } from './ProviderHttp.js';
import { parsePlanWithPrefill } from './PlanParser.js';
import { withRetry, getRetryConfig } from './Retry.js';

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';

const MessageSchema = z.object({
  content: z.array(z.object({ text: z.string().optional() })).min(1),
});

/**
 * Anthropic Claude plan advisor
 */
export class AnthropicAdvisor implements PlanAdvisor {
  readonly name: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly modelName: string,
    private readonly apiKey: string,
    private readonly config: ScannerConfig,
    private readonly options: AdvisorOptions = {}
  ) {
    this.name = `anthropic:${modelName}`;
    this.timeoutMs = config.advisorTimeoutMs;
  }

  async propose(request: PlanRequest, signal: AbortSignal): Promise<ScanPlan> {
    const body = {
      model: this.modelName,
      temperature: 0.3,
      max_tokens: 1024,
      system: PLAN_SYSTEM_PROMPT,
      messages: [
        { role: 'user', content: buildPlanPrompt(request) },
        { role: 'assistant', content: JSON_PREFILL },
      ],
    };

    const retryConfig = getRetryConfig('ANTHROPIC', this.config);

    return withRetry(
      retryConfig,
      async () => {
        const response = await postJson({
          provider: 'Anthropic',
          url: ANTHROPIC_API_URL,
          headers: {
            'x-api-key': this.apiKey,
            'anthropic-version': ANTHROPIC_VERSION,
          },
          body,
          timeoutMs: this.timeoutMs,
          signal,
          fetch: this.options.fetch,
        });
        return parsePlanWithPrefill(this.extractContent(response), JSON_PREFILL);
      },
      undefined,
      signal
    );
  }

  private extractContent(response: unknown): string {
    const data = expectShape(MessageSchema, response, 'Anthropic');
    const text = data.content[0]?.text;
    if (!text) {
      throw new AdvisorException('Anthropic response missing text');
    }
    return text;
  }
}
