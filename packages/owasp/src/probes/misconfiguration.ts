import type { Finding, ProbeDescriptor, TargetResponse } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe } from './support.js';

const PROBE_ORIGIN = 'https://origin-check.invalid';

const STACK_TRACE = /(Traceback \(most recent call last\)|at [\w$.]+ \([^)]*:\d+:\d+\)|Exception in thread|\.java:\d+\)|Fatal error: .* on line \d+)/;

/**
 * Security headers missing from a response
 */
export function missingSecurityHeaders(
  response: TargetResponse,
  https: boolean
): string[] {
  const missing: string[] = [];
  const { headers } = response;
  if (!('x-content-type-options' in headers)) {
    missing.push('X-Content-Type-Options');
  }
  if (!('x-frame-options' in headers) && !('content-security-policy' in headers)) {
    missing.push('X-Frame-Options or Content-Security-Policy');
  }
  if (https && !('strict-transport-security' in headers)) {
    missing.push('Strict-Transport-Security');
  }
  return missing;
}

export function misconfigurationProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'security-misconfiguration',
    category,
    'Checks security headers, CORS policy, version banners and error verbosity',
    async (context, kit) => {
      const findings: Finding[] = [];
      const response = await context.request(context.target, {
        method: 'GET',
        headers: { ...context.headers, Origin: PROBE_ORIGIN },
      });
      const { url, headers } = response;

      const missing = missingSecurityHeaders(
        response,
        context.target.protocol === 'https:'
      );
      if (missing.length > 0) {
        findings.push(
          kit.vulnerable(
            {
              url,
              method: 'GET',
              description: 'Security headers are missing',
              evidence: `missing: ${missing.join(', ')}`,
            },
            'LOW'
          )
        );
      }

      const allowOrigin = headers['access-control-allow-origin'];
      const allowCredentials = headers['access-control-allow-credentials'] === 'true';
      if (allowOrigin === PROBE_ORIGIN || (allowOrigin === '*' && allowCredentials)) {
        findings.push(
          kit.vulnerable({
            url,
            method: 'GET',
            description: 'CORS policy accepts arbitrary origins',
            evidence: `Access-Control-Allow-Origin: ${allowOrigin}${allowCredentials ? ', credentials allowed' : ''}`,
          })
        );
      }

      const banners = ['server', 'x-powered-by', 'x-aspnet-version']
        .filter((name) => /\d/.test(headers[name] ?? ''))
        .map((name) => `${name}: ${headers[name]}`);
      if (banners.length > 0) {
        findings.push(
          kit.info({
            url,
            description: 'Response headers disclose software versions',
            evidence: banners.join('; '),
          })
        );
      }

      const trace = STACK_TRACE.exec(response.body);
      if (trace) {
        findings.push(
          kit.vulnerable({
            url,
            method: 'GET',
            description: 'Response body contains a stack trace',
            evidence: trace[0],
          })
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url,
            method: 'GET',
            description: 'Security headers and CORS policy look hardened',
          }),
        ];
      }
      return findings;
    }
  );
}
