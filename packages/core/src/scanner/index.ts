export type { ScannerConfig, AdvisorProvider } from './ScannerConfig.js';
export {
  ADVISOR_PROVIDERS,
  ScannerConfigDefaults,
  loadScannerConfig,
  parseConfigFile,
  withDefaults,
} from './ScannerConfig.js';
export {
  ProbeExecutionError,
  AlreadyFinalizedError,
  InvalidSelectionError,
  InvalidTargetError,
  InvalidFindingError,
  ScanCancelledError,
  ConfigError,
} from './ScanErrors.js';
export { formatScanTimestamp, nextScanId } from './ScanId.js';
export type { ScanSessionOptions } from './ScanSession.js';
export { ScanSession } from './ScanSession.js';
export type { RiskLevel, RiskAssessment, SeverityCounts } from './RiskScorer.js';
export {
  SEVERITY_WEIGHTS,
  MAX_RISK_SCORE,
  calculateRiskScore,
  riskLevel,
  scoreRisk,
} from './RiskScorer.js';
export type { ProbeRunnerOptions, ProbeRunRequest } from './ProbeRunner.js';
export { ProbeRunner, errorFinding } from './ProbeRunner.js';
export { forEachWithConcurrency } from './WorkerPool.js';
export type { OrderedProbes } from './PlanOrdering.js';
export { orderProbes } from './PlanOrdering.js';
export type {
  ScanRequest,
  PlanSource,
  PlanDecision,
  ScanReport,
  ScanOrchestratorOptions,
} from './ScanOrchestrator.js';
export { ScanOrchestrator } from './ScanOrchestrator.js';
