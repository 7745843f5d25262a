import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import {
  categoryProbe,
  hasCredentials,
  isSuccess,
  withoutCredentials,
} from './support.js';

const INVALID_TOKEN = 'Bearer invalid.probe.token';

export function authenticationProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'broken-authentication',
    category,
    'Checks whether the target rejects invalid tokens and protects credentials in transit',
    async (context, kit) => {
      const findings: Finding[] = [];
      const url = context.target.href;
      const authenticated = hasCredentials(context.headers);

      if (authenticated && context.target.protocol === 'http:') {
        findings.push(
          kit.vulnerable(
            {
              url,
              description: 'Credentials are sent to the target over cleartext HTTP',
              recommendation: 'Serve the API over HTTPS only and redirect or refuse plain HTTP.',
            },
            'HIGH'
          )
        );
      }

      const anonymousHeaders = withoutCredentials(context.headers);
      const forged = await context.request(context.target, {
        method: 'GET',
        headers: { ...anonymousHeaders, Authorization: INVALID_TOKEN },
      });

      if (authenticated && isSuccess(forged)) {
        const baseline = await context.request(context.target, {
          method: 'GET',
          headers: { ...context.headers },
        });
        if (isSuccess(baseline) && baseline.body === forged.body) {
          findings.push(
            kit.vulnerable({
              url,
              method: 'GET',
              description: 'An invalid bearer token gets the same response as valid credentials',
              evidence: `status ${forged.status} with a forged token`,
            })
          );
        }
      } else if (!authenticated && isSuccess(forged)) {
        findings.push(
          kit.info({
            url,
            method: 'GET',
            description: 'Target answers without credentials; supply auth headers to test authentication',
            evidence: `status ${forged.status} with a forged token`,
          })
        );
      }

      if (findings.length === 0) {
        findings.push(
          kit.passed({
            url,
            method: 'GET',
            description: 'Invalid bearer token was rejected',
            evidence: `status ${forged.status}`,
          })
        );
      }
      return findings;
    }
  );
}
