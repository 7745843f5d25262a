export type {
  FindingStatus,
  Severity,
  VulnerableFinding,
  ObservedFinding,
  Finding,
  FindingValidation,
} from './Finding.js';
export {
  FINDING_STATUSES,
  SEVERITIES,
  FindingSchema,
  validateFindings,
  formatIssues,
  groupBySeverity,
} from './Finding.js';

export type {
  ScanSummary,
  SessionState,
  SessionSnapshot,
  ProbeOutcomeStatus,
  ProbeOutcome,
  ScanPhase,
  ScanProgress,
} from './ScanResult.js';
export { emptySummary, foldSummary, summarize } from './ScanResult.js';
