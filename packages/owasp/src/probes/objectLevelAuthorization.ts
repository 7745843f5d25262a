import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe, getPath, isSuccess } from './support.js';

/** Object endpoints tried with two neighbouring identifiers */
const OBJECT_PATHS = [
  '/api/users/{id}',
  '/api/user/{id}',
  '/api/accounts/{id}',
  '/api/orders/{id}',
];

export function objectLevelAuthorizationProbe(
  category: OwaspCategory
): ProbeDescriptor {
  return categoryProbe(
    'object-level-authorization',
    category,
    'Reads neighbouring object identifiers to detect enumerable objects',
    async (context, kit) => {
      const findings: Finding[] = [];

      for (const template of OBJECT_PATHS) {
        const first = await getPath(context, template.replace('{id}', '1'));
        if (!isSuccess(first)) continue;
        const second = await getPath(context, template.replace('{id}', '2'));
        if (!isSuccess(second) || second.body === first.body) continue;

        findings.push(
          kit.vulnerable({
            url: second.url,
            method: 'GET',
            description: `Sequential objects under ${template} are readable with the same credentials`,
            evidence: `id 1 -> ${first.status}, id 2 -> ${second.status}`,
          })
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url: context.target.href,
            description: 'No enumerable object endpoints found',
          }),
        ];
      }
      return findings;
    }
  );
}
