const INTERNAL_HOST_PATTERNS = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^localhost$/i,
  /^::1$/,
  /^\[::1\]$/,
];

/**
 * Parse a scan target, defaulting to https when no scheme is given.
 * Returns null for anything that is not an http(s) URL with a host.
 */
export function normalizeTarget(raw: string): URL | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  try {
    const url = new URL(withScheme);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    if (!url.hostname) return null;
    return url;
  } catch {
    return null;
  }
}

/**
 * Resolve a path against the target origin
 */
export function resolvePath(target: URL, path: string): URL {
  return new URL(path, target.origin);
}

/**
 * Check if a host is loopback, link-local or RFC 1918
 */
export function isInternalHost(host: string): boolean {
  return INTERNAL_HOST_PATTERNS.some((pattern) => pattern.test(host));
}
