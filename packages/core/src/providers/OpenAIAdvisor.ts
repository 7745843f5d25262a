import { z } from 'zod';
import type { PlanAdvisor, PlanRequest, ScanPlan } from './PlanAdvisor.js';
import { AdvisorException } from './PlanAdvisor.js';
import type { ScannerConfig } from '../scanner/ScannerConfig.js';
import { PLAN_SYSTEM_PROMPT, buildPlanPrompt } from '../prompt/PromptBuilder.js';
import type { AdvisorOptions } from './ProviderHttp.js';
import { expectShape, postJson } from './ProviderHttp.js';
import { parsePlan } from './PlanParser.js';
import { withRetry, getRetryConfig } from './Retry.js';

const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

/**
 * Extract the first choice's text from a chat completion
 */
export function extractChatContent(response: unknown, provider: string): string {
  const data = expectShape(ChatCompletionSchema, response, provider);
  const content = data.choices[0]?.message.content;
  if (!content) {
    throw new AdvisorException(`${provider} response missing content`);
  }
  return content;
}

/**
 * Build a chat completion body for the plan prompt
 */
export function buildChatBody(
  model: string | undefined,
  request: PlanRequest
): Record<string, unknown> {
  const body: Record<string, unknown> = {
    response_format: { type: 'json_object' },
    messages: [
      { role: 'system', content: PLAN_SYSTEM_PROMPT },
      { role: 'user', content: buildPlanPrompt(request) },
    ],
  };
  if (model) body['model'] = model;

  // GPT-5 models use different parameter names
  const lower = model?.toLowerCase() ?? '';
  const isGpt5 = lower.startsWith('gpt-5');
  body[isGpt5 ? 'max_completion_tokens' : 'max_tokens'] = 1024;

  // Some GPT-5 variants don't support temperature
  if (!lower.startsWith('gpt-5-mini') && !lower.startsWith('gpt-5-nano')) {
    body['temperature'] = 0.3;
  }

  return body;
}

/**
 * OpenAI plan advisor
 */
export class OpenAIAdvisor implements PlanAdvisor {
  readonly name: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly modelName: string,
    private readonly apiKey: string,
    private readonly config: ScannerConfig,
    private readonly options: AdvisorOptions = {}
  ) {
    this.name = `openai:${modelName}`;
    this.timeoutMs = config.advisorTimeoutMs;
  }

  async propose(request: PlanRequest, signal: AbortSignal): Promise<ScanPlan> {
    const body = buildChatBody(this.modelName, request);
    const retryConfig = getRetryConfig('OPENAI', this.config);

    return withRetry(
      retryConfig,
      async () => {
        const response = await postJson({
          provider: 'OpenAI',
          url: OPENAI_API_URL,
          headers: { Authorization: `Bearer ${this.apiKey}` },
          body,
          timeoutMs: this.timeoutMs,
          signal,
          fetch: this.options.fetch,
        });
        return parsePlan(extractChatContent(response, 'OpenAI'));
      },
      undefined,
      signal
    );
  }
}
