export type {
  PlanAdvisor,
  PlanRequest,
  ProbeBrief,
  ScanPlan,
  AdvisorResult,
  ConsultOptions,
} from './PlanAdvisor.js';
export { AdvisorException, ScanPlanSchema, consultAdvisor } from './PlanAdvisor.js';

export { OpenAIAdvisor } from './OpenAIAdvisor.js';
export { AzureOpenAIAdvisor } from './AzureOpenAIAdvisor.js';
export { AnthropicAdvisor } from './AnthropicAdvisor.js';
export { OllamaAdvisor } from './OllamaAdvisor.js';

export { buildAdvisor, getDefaultModel } from './AdvisorFactory.js';
export type { AdvisorOptions } from './ProviderHttp.js';

export { parsePlan, parsePlanWithPrefill } from './PlanParser.js';
export { extractJsonObject } from './JsonExtract.js';

export type { RetryConfig } from './Retry.js';
export { withRetry, getRetryConfig } from './Retry.js';
