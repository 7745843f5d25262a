import type { ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe } from './support.js';

const BURST_SIZE = 10;

const RATE_LIMIT_HEADERS = [
  'ratelimit-limit',
  'ratelimit-policy',
  'x-ratelimit-limit',
  'x-rate-limit-limit',
  'retry-after',
];

export function resourceConsumptionProbe(
  category: OwaspCategory
): ProbeDescriptor {
  return categoryProbe(
    'rate-limiting',
    category,
    `Sends a burst of ${BURST_SIZE} requests and looks for throttling`,
    async (context, kit) => {
      const url = context.target.href;
      let throttledAt: number | null = null;
      let advertised: string | null = null;

      for (let attempt = 1; attempt <= BURST_SIZE; attempt++) {
        const response = await context.request(context.target, {
          method: 'GET',
          headers: { ...context.headers },
        });
        if (advertised === null) {
          advertised =
            RATE_LIMIT_HEADERS.find((name) => name in response.headers) ?? null;
        }
        if (response.status === 429) {
          throttledAt = attempt;
          break;
        }
      }

      if (throttledAt !== null) {
        return [
          kit.passed({
            url,
            method: 'GET',
            description: 'Target throttles request bursts',
            evidence: `429 after ${throttledAt} request(s)`,
          }),
        ];
      }
      if (advertised !== null) {
        return [
          kit.passed({
            url,
            method: 'GET',
            description: 'Target advertises a rate limit',
            evidence: `header ${advertised}`,
          }),
        ];
      }
      return [
        kit.vulnerable({
          url,
          method: 'GET',
          description: 'No rate limiting observed',
          evidence: `${BURST_SIZE} requests accepted without 429 or rate-limit headers`,
        }),
      ];
    }
  );
}
