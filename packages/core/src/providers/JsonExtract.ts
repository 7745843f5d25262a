/**
 * Find the first balanced JSON object in free text, e.g. a model answer
 * wrapped in prose or a code fence
 */
export function extractJsonObject(raw: string): string | null {
  for (let start = 0; start < raw.length; start += 1) {
    if (raw[start] !== '{') continue;
    const end = findJsonObjectEnd(raw, start);
    if (end == null) continue;
    const candidate = raw.slice(start, end + 1);
    if (isJsonObject(candidate)) return candidate;
  }
  return null;
}

function findJsonObjectEnd(raw: string, start: number): number | null {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let idx = start; idx < raw.length; idx += 1) {
    const ch = raw[idx];
    if (inString) {
      if (escaped) {
        escaped = false;
        continue;
      }
      if (ch === '\\') {
        escaped = true;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    if (ch === '{') {
      depth += 1;
      continue;
    }
    if (ch === '}') {
      if (depth === 0) continue;
      depth -= 1;
      if (depth === 0) return idx;
    }
  }
  return null;
}

function isJsonObject(candidate: string): boolean {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
}
