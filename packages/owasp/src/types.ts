import type { Severity } from '@apiprobe/core';

/**
 * One OWASP API Security Top 10 category
 */
export interface OwaspCategory {
  /** Short code (e.g., API2) */
  code: string;
  /** Full identifier (e.g., API2:2023) */
  id: string;
  name: string;
  /** Severity used for findings a probe of this category confirms */
  severity: Severity;
  summary: string;
  recommendation: string;
}

export interface CategoryFile {
  version: string;
  categories: OwaspCategory[];
}
