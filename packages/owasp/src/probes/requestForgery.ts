import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import { isInternalHost } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe } from './support.js';

const URL_PARAMETER = /^(url|uri|link|src|source|dest|destination|redirect|redirect_uri|return_url|next|callback|webhook|feed|image_url|fetch)$/i;

const EMBEDDED_URL = /https?:\/\/([a-z0-9.-]+|\[[0-9a-f:]+\])(?::\d+)?/gi;

/**
 * Hosts of absolute URLs in the text that resolve to internal ranges
 */
export function internalHostsIn(text: string): string[] {
  const hosts = new Set<string>();
  for (const match of text.matchAll(EMBEDDED_URL)) {
    const host = match[1].replace(/^\[|\]$/g, '');
    if (isInternalHost(host)) {
      hosts.add(host);
    }
  }
  return [...hosts];
}

/**
 * Passive only: no URL is ever submitted to the target
 */
export function requestForgeryProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'ssrf-surface',
    category,
    'Flags URL-taking parameters and internal addresses leaked in responses',
    async (context, kit) => {
      const findings: Finding[] = [];
      const url = context.target.href;

      for (const name of new Set(context.target.searchParams.keys())) {
        if (!URL_PARAMETER.test(name)) continue;
        findings.push(
          kit.info({
            url,
            description: `Parameter "${name}" takes a URL; verify the server validates fetch destinations`,
            recommendation: category.recommendation,
          })
        );
      }

      const response = await context.request(context.target, {
        method: 'GET',
        headers: { ...context.headers },
      });
      const leaked = internalHostsIn(response.body);
      if (leaked.length > 0) {
        findings.push(
          kit.vulnerable(
            {
              url: response.url,
              method: 'GET',
              description: 'Response references internal network addresses',
              evidence: `hosts: ${leaked.join(', ')}`,
            },
            'MEDIUM'
          )
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url,
            method: 'GET',
            description: 'No URL parameters or internal addresses observed',
          }),
        ];
      }
      return findings;
    }
  );
}
