import type { ProbeDescriptor } from './Probe.js';
import { categoryCode } from './Probe.js';
import { InvalidSelectionError } from '../scanner/ScanErrors.js';

/**
 * Read-only, ordered set of probes, built once at process start.
 * Registration order is the default execution order.
 */
export class ProbeRegistry implements Iterable<ProbeDescriptor> {
  private readonly probes: readonly ProbeDescriptor[];
  private readonly byName = new Map<string, ProbeDescriptor>();
  private readonly byCategory = new Map<string, ProbeDescriptor[]>();
  private readonly positions = new Map<string, number>();

  constructor(probes: Iterable<ProbeDescriptor>) {
    const list: ProbeDescriptor[] = [];
    for (const probe of probes) {
      const key = normalizeKey(probe.name);
      if (!key) {
        throw new Error('Probe name must not be empty');
      }
      if (this.byName.has(key)) {
        throw new Error(`Duplicate probe name: ${probe.name}`);
      }
      this.byName.set(key, probe);
      this.positions.set(probe.name, list.length);
      for (const alias of new Set([
        normalizeKey(probe.category),
        normalizeKey(categoryCode(probe.category)),
      ])) {
        if (!alias) continue;
        const members = this.byCategory.get(alias) ?? [];
        members.push(probe);
        this.byCategory.set(alias, members);
      }
      list.push(probe);
    }
    this.probes = Object.freeze(list);
  }

  get size(): number {
    return this.probes.length;
  }

  /**
   * Probe by exact name (case-insensitive)
   */
  get(name: string): ProbeDescriptor | undefined {
    return this.byName.get(normalizeKey(name));
  }

  list(): readonly ProbeDescriptor[] {
    return this.probes;
  }

  /**
   * Probes a key refers to: a probe name, else a category (API2 or API2:2023)
   */
  lookup(key: string): readonly ProbeDescriptor[] {
    const normalized = normalizeKey(key);
    const probe = this.byName.get(normalized);
    if (probe) return [probe];
    return this.byCategory.get(normalized) ?? [];
  }

  /**
   * Resolve an operator selection into probes, in registry order.
   * No keys selects every probe.
   */
  select(keys?: readonly string[]): ProbeDescriptor[] {
    if (!keys || keys.length === 0) {
      return [...this.probes];
    }

    const chosen = new Set<string>();
    const unknown: string[] = [];
    for (const key of keys) {
      const matches = this.lookup(key);
      if (matches.length === 0) {
        unknown.push(key);
        continue;
      }
      for (const probe of matches) {
        chosen.add(probe.name);
      }
    }

    if (unknown.length > 0) {
      throw new InvalidSelectionError(unknown);
    }

    return this.probes.filter((probe) => chosen.has(probe.name));
  }

  /**
   * Registration index of a probe, or -1
   */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1;
  }

  [Symbol.iterator](): Iterator<ProbeDescriptor> {
    return this.probes[Symbol.iterator]();
  }
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}
