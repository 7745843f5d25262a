/**
 * @apiprobe/owasp
 *
 * OWASP API Security Top 10 catalog and default probes
 */

export type { OwaspCategory, CategoryFile } from './types.js';
export { CategoryCatalog } from './CategoryCatalog.js';
export type { OwaspRegistryOptions } from './registry.js';
export { PROBE_FACTORIES, createOwaspProbes, createOwaspRegistry } from './registry.js';
export type { FindingDraft, FindingKit } from './probes/support.js';
export { findingKit, categoryProbe } from './probes/support.js';
export { sensitiveKeys } from './probes/propertyExposure.js';
export { internalHostsIn } from './probes/requestForgery.js';
export { missingSecurityHeaders } from './probes/misconfiguration.js';
