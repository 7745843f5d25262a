import type { Finding, ProbeDescriptor, Severity } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe, getPath, isSuccess } from './support.js';

type ExposureKind = 'documentation' | 'legacy' | 'debug';

const INVENTORY_PATHS: ReadonlyArray<{ path: string; kind: ExposureKind }> = [
  { path: '/api-docs', kind: 'documentation' },
  { path: '/swagger.json', kind: 'documentation' },
  { path: '/openapi.json', kind: 'documentation' },
  { path: '/api/v0', kind: 'legacy' },
  { path: '/api/v1', kind: 'legacy' },
  { path: '/debug', kind: 'debug' },
  { path: '/actuator', kind: 'debug' },
];

const DEBUG_SEVERITY: Severity = 'HIGH';

export function inventoryProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'inventory-management',
    category,
    'Looks for public API documentation, old versions and debug endpoints',
    async (context, kit) => {
      const findings: Finding[] = [];

      for (const { path, kind } of INVENTORY_PATHS) {
        // The target itself is not an exposure
        if (context.target.pathname.replace(/\/$/, '') === path) continue;
        const response = await getPath(context, path);
        if (!isSuccess(response)) continue;

        const draft = {
          url: response.url,
          method: 'GET',
          evidence: `status ${response.status}`,
        };
        switch (kind) {
          case 'documentation':
            findings.push(
              kit.info({ ...draft, description: `API documentation is public at ${path}` })
            );
            break;
          case 'legacy':
            findings.push(
              kit.vulnerable({
                ...draft,
                description: `Versioned endpoint ${path} is reachable; confirm it is still maintained`,
              })
            );
            break;
          case 'debug':
            findings.push(
              kit.vulnerable(
                { ...draft, description: `Debug endpoint ${path} is exposed` },
                DEBUG_SEVERITY
              )
            );
            break;
        }
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url: context.target.href,
            description: 'No undocumented versions, debug endpoints or public docs found',
          }),
        ];
      }
      return findings;
    }
  );
}
