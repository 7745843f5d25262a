const URL_PATTERN = /https?:\/\/[^\s'"<>]+/g;
const MIN_SECRET_LENGTH = 4;

/**
 * Truncate text to max length with ellipsis
 */
export function truncateText(text: string, maxLength = 100): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

/**
 * Strip query string and fragment from a URL for display
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}

/**
 * Replace every occurrence of the given secrets with a marker
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  return secrets
    .filter((secret) => secret.length >= MIN_SECRET_LENGTH)
    .reduce((current, secret) => current.split(secret).join('[redacted]'), text);
}

/**
 * One-line description of a failure, safe to store in a finding
 */
export function summarizeError(
  error: unknown,
  secrets: readonly string[] = [],
  maxLength = 200
): string {
  let raw: string;
  if (error instanceof Error) {
    raw = error.message ? `${error.name}: ${error.message}` : error.name;
  } else {
    raw = String(error);
  }

  const cleaned = redactSecrets(raw, secrets)
    .replace(URL_PATTERN, (match) => sanitizeUrl(match))
    .replace(/\s+/g, ' ')
    .trim();

  return truncateText(cleaned || 'Unknown error', maxLength);
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
