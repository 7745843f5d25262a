import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { SEVERITIES, formatIssues } from '@apiprobe/core';
import type { OwaspCategory, CategoryFile } from './types.js';

const CategorySchema = z.object({
  code: z.string().regex(/^API\d+$/),
  id: z.string().regex(/^API\d+:\d{4}$/),
  name: z.string().min(1),
  severity: z.enum(SEVERITIES),
  summary: z.string(),
  recommendation: z.string(),
});

const CategoryFileSchema = z.object({
  version: z.string(),
  categories: z.array(CategorySchema).min(1),
});

/**
 * OWASP category catalog, read from the package's bundled YAML data
 */
export class CategoryCatalog {
  private readonly filePath: string;
  private loaded: CategoryFile | null = null;

  /**
   * @param filePath Catalog file. Defaults to the bundled data/categories.yaml.
   */
  constructor(filePath?: string) {
    this.filePath = filePath ?? join(__dirname, '..', 'data', 'categories.yaml');
  }

  /**
   * Catalog edition (e.g., 2023)
   */
  get version(): string {
    return this.load().version;
  }

  /**
   * All categories in catalog order
   */
  list(): OwaspCategory[] {
    return [...this.load().categories];
  }

  /**
   * Find a category by code (API2) or full identifier (API2:2023)
   */
  get(key: string): OwaspCategory | null {
    const normalized = key.trim().toUpperCase();
    return (
      this.load().categories.find(
        (category) => category.code === normalized || category.id === normalized
      ) ?? null
    );
  }

  /**
   * Like get, but a missing category is an error
   */
  require(key: string): OwaspCategory {
    const category = this.get(key);
    if (!category) {
      throw new Error(`Category ${key} not found in ${this.filePath}`);
    }
    return category;
  }

  private load(): CategoryFile {
    if (this.loaded) {
      return this.loaded;
    }
    if (!existsSync(this.filePath)) {
      throw new Error(`Category catalog not found: ${this.filePath}`);
    }

    const raw: unknown = parseYaml(readFileSync(this.filePath, 'utf-8'));
    const result = CategoryFileSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(
        `Invalid category catalog ${this.filePath}: ${formatIssues(result.error)}`
      );
    }

    const seen = new Set<string>();
    for (const category of result.data.categories) {
      if (seen.has(category.code)) {
        throw new Error(`Duplicate category ${category.code} in ${this.filePath}`);
      }
      seen.add(category.code);
    }

    this.loaded = result.data;
    return this.loaded;
  }
}
