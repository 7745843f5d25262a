export type { ProbeContext, ProbeDescriptor } from './Probe.js';
export { defineProbe, categoryCode } from './Probe.js';

export { ProbeRegistry } from './ProbeRegistry.js';

export type {
  FetchLike,
  TargetRequest,
  TargetRequestInit,
  TargetResponse,
  TargetClientOptions,
} from './TargetClient.js';
export { TargetClient } from './TargetClient.js';
