import type { PlanRequest } from '../providers/PlanAdvisor.js';

/**
 * Prompt version, reported in the plan decision of scans that consulted an advisor
 */
export const PROMPT_VERSION = 'v1';

export const PLAN_SYSTEM_PROMPT = `You are an expert penetration tester planning an OWASP API Security Top 10 assessment.
Given a target API and a list of available probes, decide which probes should run first.
Prioritize by likely data sensitivity, authentication complexity and the attack vectors typical for the API's domain.
Only use probe names or category codes from the list you are given. Do not invent probes.
Respond with a single JSON object and nothing else:
{"priority_order": ["<probe name or category code>", ...], "rationale": "<two or three sentences>"}`;

/**
 * Assistant prefill that forces a JSON answer (Anthropic)
 */
export const JSON_PREFILL = '{';

/**
 * Header names with their values hidden. Values never leave the process.
 */
export function redactHeaders(
  headers: Readonly<Record<string, string>>
): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const name of Object.keys(headers)) {
    redacted[name] = '<redacted>';
  }
  return redacted;
}

/**
 * Build the user prompt for a plan request
 */
export function buildPlanPrompt(request: PlanRequest): string {
  const probes = request.probes
    .map((probe) => {
      const description = probe.description ? ` - ${probe.description}` : '';
      return `- ${probe.name} (${probe.category})${description}`;
    })
    .join('\n');

  return `Target: ${request.target}
Headers: ${JSON.stringify(redactHeaders(request.headers))}
Available probes:
${probes}`;
}
