import type { ProbeDescriptor } from '@apiprobe/core';
import { ProbeRegistry } from '@apiprobe/core';
import { CategoryCatalog } from './CategoryCatalog.js';
import type { OwaspCategory } from './types.js';
import { objectLevelAuthorizationProbe } from './probes/objectLevelAuthorization.js';
import { authenticationProbe } from './probes/authentication.js';
import { propertyExposureProbe } from './probes/propertyExposure.js';
import { resourceConsumptionProbe } from './probes/resourceConsumption.js';
import { functionLevelAuthorizationProbe } from './probes/functionLevelAuthorization.js';
import { requestForgeryProbe } from './probes/requestForgery.js';
import { misconfigurationProbe } from './probes/misconfiguration.js';
import { inventoryProbe } from './probes/inventory.js';
import { injectionProbe } from './probes/injection.js';

type ProbeFactory = (category: OwaspCategory) => ProbeDescriptor;

/**
 * Probe factory per category code. API6 has no detection-safe probe.
 */
export const PROBE_FACTORIES: Readonly<Partial<Record<string, ProbeFactory>>> = {
  API1: objectLevelAuthorizationProbe,
  API2: authenticationProbe,
  API3: propertyExposureProbe,
  API4: resourceConsumptionProbe,
  API5: functionLevelAuthorizationProbe,
  API7: requestForgeryProbe,
  API8: misconfigurationProbe,
  API9: inventoryProbe,
  API10: injectionProbe,
};

export interface OwaspRegistryOptions {
  catalog?: CategoryCatalog;
}

/**
 * Build the default probes, in catalog order
 */
export function createOwaspProbes(options: OwaspRegistryOptions = {}): ProbeDescriptor[] {
  const catalog = options.catalog ?? new CategoryCatalog();
  return catalog.list().flatMap((category) => {
    const factory = PROBE_FACTORIES[category.code];
    return factory ? [factory(category)] : [];
  });
}

export function createOwaspRegistry(options: OwaspRegistryOptions = {}): ProbeRegistry {
  return new ProbeRegistry(createOwaspProbes(options));
}
