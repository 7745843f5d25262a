import type { ProbeDescriptor } from '../probes/Probe.js';
import type { ProbeRegistry } from '../probes/ProbeRegistry.js';

export interface OrderedProbes {
  probes: ProbeDescriptor[];
  /** Plan entries that named nothing in the selection */
  ignored: string[];
}

/**
 * Put the probes a plan prioritizes first, in plan order, followed by the
 * rest of the selection in registry order. The plan can neither add nor
 * drop probes.
 */
export function orderProbes(
  registry: ProbeRegistry,
  selected: readonly ProbeDescriptor[],
  priorityOrder: readonly string[]
): OrderedProbes {
  const selectedNames = new Set(selected.map((probe) => probe.name));
  const seen = new Set<string>();
  const probes: ProbeDescriptor[] = [];
  const ignored: string[] = [];

  for (const entry of priorityOrder) {
    const matches = registry
      .lookup(entry)
      .filter((probe) => selectedNames.has(probe.name));
    if (matches.length === 0) {
      ignored.push(entry);
      continue;
    }
    for (const probe of matches) {
      if (seen.has(probe.name)) continue;
      seen.add(probe.name);
      probes.push(probe);
    }
  }

  const remaining = selected
    .filter((probe) => !seen.has(probe.name))
    .sort((a, b) => registry.indexOf(a.name) - registry.indexOf(b.name));

  return { probes: [...probes, ...remaining], ignored };
}
