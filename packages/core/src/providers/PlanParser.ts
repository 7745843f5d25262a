import { z } from 'zod';
import { formatIssues } from '../types/Finding.js';
import { toError } from '../utils/text.js';
import type { ScanPlan } from './PlanAdvisor.js';
import { AdvisorException } from './PlanAdvisor.js';
import { extractJsonObject } from './JsonExtract.js';

/**
 * Raw plan from model response
 */
const RawPlanSchema = z.object({
  priority_order: z.array(z.string()).optional(),
  recommended_order: z.array(z.string()).optional(),
  priority_tests: z
    .array(z.object({ test_id: z.string() }).passthrough())
    .optional(),
  rationale: z.string().optional(),
  reasoning: z.string().optional(),
});

/**
 * Parse model response JSON into a scan plan
 */
export function parsePlan(content: string): ScanPlan {
  const jsonText = extractJsonObject(content) ?? content.trim();

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (error) {
    throw new AdvisorException('Advisor response is not valid JSON', toError(error));
  }

  const result = RawPlanSchema.safeParse(raw);
  if (!result.success) {
    throw new AdvisorException(
      `Advisor response has an unexpected shape: ${formatIssues(result.error)}`
    );
  }

  const data = result.data;
  const order =
    data.priority_order ??
    data.recommended_order ??
    data.priority_tests?.map((test) => test.test_id);
  if (!order) {
    throw new AdvisorException('Advisor response missing priority_order');
  }

  const priorityOrder = order
    .map((entry) => entry.trim())
    .filter((entry, index, self) => entry && self.indexOf(entry) === index);

  return {
    priorityOrder,
    rationale: (data.rationale ?? data.reasoning ?? '').trim(),
  };
}

/**
 * Parse model response with JSON prefill (Anthropic)
 */
export function parsePlanWithPrefill(content: string, prefill: string): ScanPlan {
  // Anthropic responses continue from the prefill
  return parsePlan(prefill + content);
}
