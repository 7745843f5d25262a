export {
  PROMPT_VERSION,
  PLAN_SYSTEM_PROMPT,
  JSON_PREFILL,
  redactHeaders,
  buildPlanPrompt,
} from './PromptBuilder.js';
