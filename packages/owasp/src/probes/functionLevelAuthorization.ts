import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import {
  categoryProbe,
  getPath,
  isSuccess,
  withoutCredentials,
} from './support.js';

const PRIVILEGED_PATHS = [
  '/api/admin',
  '/admin',
  '/api/admin/users',
  '/api/internal',
  '/api/management',
];

export function functionLevelAuthorizationProbe(
  category: OwaspCategory
): ProbeDescriptor {
  return categoryProbe(
    'function-level-authorization',
    category,
    'Requests administrative paths without credentials',
    async (context, kit) => {
      const findings: Finding[] = [];
      const anonymous = withoutCredentials(context.headers);

      for (const path of PRIVILEGED_PATHS) {
        const response = await getPath(context, path, anonymous);
        if (!isSuccess(response)) continue;
        findings.push(
          kit.vulnerable({
            url: response.url,
            method: 'GET',
            description: `Administrative path ${path} is reachable without credentials`,
            evidence: `status ${response.status}`,
          })
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url: context.target.href,
            description: 'Administrative paths refused anonymous requests',
          }),
        ];
      }
      return findings;
    }
  );
}
