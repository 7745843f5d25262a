/**
 * @apiprobe/core
 *
 * Probe execution and aggregation engine for API security scans
 */

// Types
export type {
  FindingStatus,
  Severity,
  VulnerableFinding,
  ObservedFinding,
  Finding,
  FindingValidation,
  ScanSummary,
  SessionState,
  SessionSnapshot,
  ProbeOutcomeStatus,
  ProbeOutcome,
  ScanPhase,
  ScanProgress,
} from './types/index.js';
export {
  FINDING_STATUSES,
  SEVERITIES,
  FindingSchema,
  validateFindings,
  formatIssues,
  groupBySeverity,
  emptySummary,
  foldSummary,
  summarize,
} from './types/index.js';

// Probes
export type {
  ProbeContext,
  ProbeDescriptor,
  FetchLike,
  TargetRequest,
  TargetRequestInit,
  TargetResponse,
  TargetClientOptions,
} from './probes/index.js';
export {
  defineProbe,
  categoryCode,
  ProbeRegistry,
  TargetClient,
} from './probes/index.js';

// Scanner
export type {
  ScannerConfig,
  AdvisorProvider,
  ScanSessionOptions,
  RiskLevel,
  RiskAssessment,
  SeverityCounts,
  ProbeRunnerOptions,
  ProbeRunRequest,
  OrderedProbes,
  ScanRequest,
  PlanSource,
  PlanDecision,
  ScanReport,
  ScanOrchestratorOptions,
} from './scanner/index.js';
export {
  ADVISOR_PROVIDERS,
  ScannerConfigDefaults,
  loadScannerConfig,
  parseConfigFile,
  withDefaults,
  ProbeExecutionError,
  AlreadyFinalizedError,
  InvalidSelectionError,
  InvalidTargetError,
  InvalidFindingError,
  ScanCancelledError,
  ConfigError,
  formatScanTimestamp,
  nextScanId,
  ScanSession,
  SEVERITY_WEIGHTS,
  MAX_RISK_SCORE,
  calculateRiskScore,
  riskLevel,
  scoreRisk,
  ProbeRunner,
  errorFinding,
  forEachWithConcurrency,
  orderProbes,
  ScanOrchestrator,
} from './scanner/index.js';

// Prompt building
export {
  PROMPT_VERSION,
  PLAN_SYSTEM_PROMPT,
  JSON_PREFILL,
  redactHeaders,
  buildPlanPrompt,
} from './prompt/index.js';

// Plan advisors
export type {
  PlanAdvisor,
  PlanRequest,
  ProbeBrief,
  ScanPlan,
  AdvisorResult,
  ConsultOptions,
  AdvisorOptions,
  RetryConfig,
} from './providers/index.js';
export {
  AdvisorException,
  ScanPlanSchema,
  consultAdvisor,
  OpenAIAdvisor,
  AzureOpenAIAdvisor,
  AnthropicAdvisor,
  OllamaAdvisor,
  buildAdvisor,
  getDefaultModel,
  parsePlan,
  parsePlanWithPrefill,
  extractJsonObject,
  withRetry,
  getRetryConfig,
} from './providers/index.js';

// Utilities
export type { LogLevel, Logger } from './utils/index.js';
export {
  LOG_LEVELS,
  createConsoleLogger,
  silentLogger,
  truncateText,
  sanitizeUrl,
  redactSecrets,
  summarizeError,
  toError,
  sleep,
  raceAbort,
  normalizeTarget,
  resolvePath,
  isInternalHost,
} from './utils/index.js';
