import type { Finding, ProbeDescriptor } from '@apiprobe/core';
import type { OwaspCategory } from '../types.js';
import { categoryProbe } from './support.js';

const QUERY_PARAMETER = 'q';

/** Unbalanced quotes; enough to surface parser errors, never a working payload */
const QUOTE_PAYLOAD = `probe'"`;

const REFLECTION_MARKER = '<probe-7f3a>';

const SQL_ERROR = /(SQL syntax|SQLSTATE|ORA-\d{5}|sqlite3?\.|SQLite error|PG::SyntaxError|psql:|unterminated quoted string|syntax error at or near|mysql_fetch|Unclosed quotation mark)/i;

function withQuery(target: URL, value: string): URL {
  const url = new URL(target.href);
  url.searchParams.set(QUERY_PARAMETER, value);
  return url;
}

export function injectionProbe(category: OwaspCategory): ProbeDescriptor {
  return categoryProbe(
    'injection',
    category,
    'Sends quote and markup markers and looks for database errors or raw reflection',
    async (context, kit) => {
      const findings: Finding[] = [];

      const quoted = await context.request(withQuery(context.target, QUOTE_PAYLOAD), {
        method: 'GET',
        headers: { ...context.headers },
      });
      const sqlError = SQL_ERROR.exec(quoted.body);
      if (sqlError) {
        findings.push(
          kit.vulnerable(
            {
              url: quoted.url,
              method: 'GET',
              description: 'Quote characters in input produce a database error',
              evidence: sqlError[0],
            },
            'CRITICAL'
          )
        );
      }

      const marked = await context.request(
        withQuery(context.target, REFLECTION_MARKER),
        { method: 'GET', headers: { ...context.headers } }
      );
      if (marked.body.includes(REFLECTION_MARKER)) {
        findings.push(
          kit.vulnerable({
            url: marked.url,
            method: 'GET',
            description: 'Markup in input is reflected without encoding',
            evidence: `parameter ${QUERY_PARAMETER} echoed ${REFLECTION_MARKER}`,
          })
        );
      }

      if (findings.length === 0) {
        return [
          kit.passed({
            url: context.target.href,
            method: 'GET',
            description: 'No database errors or raw reflection observed',
          }),
        ];
      }
      return findings;
    }
  );
}
