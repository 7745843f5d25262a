let lastBase = '';
let lastIssuedMs = Number.NEGATIVE_INFINITY;
let sequence = 0;

/**
 * Format a creation time as YYYYMMDD_HHMMSS_mmm (UTC)
 */
export function formatScanTimestamp(at: Date): string {
  const pad = (value: number, width = 2): string =>
    String(value).padStart(width, '0');
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}` +
    `_${pad(at.getUTCMilliseconds(), 3)}`
  );
}

/**
 * Derive a scan id from its creation time. Ids never go backwards: a time at
 * or before the last issued one reuses that base with a -N suffix, so ids stay
 * unique for the process lifetime even when the clock steps back.
 */
export function nextScanId(at: Date): string {
  const ms = at.getTime();
  if (ms <= lastIssuedMs) {
    sequence += 1;
    return `${lastBase}-${sequence}`;
  }
  lastIssuedMs = ms;
  lastBase = formatScanTimestamp(at);
  sequence = 0;
  return lastBase;
}
