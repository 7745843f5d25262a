import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe, getPath, isSuccess, parseJsonBody } from './support.js';

const SENSITIVE_KEY = /^(password|passwd|pass_hash|password_hash|secret|client_secret|api_?key|access_token|refresh_token|ssn|credit_card|card_number|cvv|private_key)$/i;

const SAMPLE_PATHS = ['/api/users/1', '/api/user/1', '/api/me'];

/**
 * Collect property paths whose names look sensitive
 */
export function sensitiveKeys(value: unknown, path = '', depth = 0): string[] {
  if (depth > 6 || value === null || typeof value !== 'object') {
    return [];
  }
  if (Array.isArray(value)) {
    return value
      .slice(0, 20)
      .flatMap((item: unknown, index) =>
        sensitiveKeys(item, `${path}[${index}]`, depth + 1)
      );
  }
  return Object.entries(value).flatMap(([key, child]) => {
    const childPath = path ? `${path}.${key}` : key;
    const own = SENSITIVE_KEY.test(key) ? [childPath] : [];
    return [...own, ...sensitiveKeys(child, childPath, depth + 1)];
  });
}

export function propertyExposureProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'excessive-data-exposure',
    category,
    'Looks for sensitive properties in JSON responses',
    async (context, kit) => {
      const findings: Finding[] = [];
      const responses = [
        await context.request(context.target, {
          method: 'GET',
          headers: { ...context.headers },
        }),
      ];
      for (const path of SAMPLE_PATHS) {
        responses.push(await getPath(context, path));
      }

      for (const response of responses) {
        if (!isSuccess(response)) continue;
        const keys = sensitiveKeys(parseJsonBody(response));
        if (keys.length === 0) continue;
        findings.push(
          kit.vulnerable({
            url: response.url,
            method: response.method,
            description: 'Response exposes sensitive object properties',
            evidence: `properties: ${keys.join(', ')}`,
          })
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url: context.target.href,
            description: 'No sensitive properties found in sampled responses',
          }),
        ];
      }
      return findings;
    }
  );
}
