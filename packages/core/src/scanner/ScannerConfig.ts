import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { formatIssues } from '../types/Finding.js';
import { toError } from '../utils/text.js';
import { ConfigError } from './ScanErrors.js';

/**
 * Plan advisor providers
 */
export const ADVISOR_PROVIDERS = [
  'none',
  'openai',
  'azure-openai',
  'anthropic',
  'ollama',
] as const;
export type AdvisorProvider = (typeof ADVISOR_PROVIDERS)[number];

/**
 * Engine configuration options
 */
export interface ScannerConfig {
  /** Probes running at the same time */
  concurrency: number;
  /** Deadline for a single probe */
  probeTimeoutMs: number;
  /** How long in-flight probes may finish after cancellation */
  cancelGraceMs: number;
  /** Request-rate ceiling against the target; 0 disables throttling */
  maxRequestsPerSecond: number;
  /** Plan advisor provider */
  advisorProvider: AdvisorProvider;
  /** Model or deployment used by the advisor */
  advisorModel?: string;
  /** Deadline for the single advisor call */
  advisorTimeoutMs: number;
  /** Allow remote LLM providers (openai, azure-openai, anthropic) */
  allowRemoteProviders: boolean;
  /** List of allowed provider names */
  allowedProviders?: string[];
  /** OpenAI API key */
  openaiApiKey?: string;
  /** Anthropic API key */
  anthropicApiKey?: string;
  /** Azure OpenAI API key */
  azureOpenaiApiKey?: string;
  /** Azure OpenAI resource endpoint */
  azureOpenaiEndpoint?: string;
  /** Azure OpenAI deployment name */
  azureOpenaiDeployment?: string;
  /** Azure OpenAI REST API version */
  azureOpenaiApiVersion?: string;
  /** Ollama endpoint URL */
  ollamaEndpoint?: string;
  /** Maximum retries for advisor calls */
  retryMaxRetries?: number;
  /** Base delay between retries in ms */
  retryDelayMs?: number;
  logLevel: LogLevel;
}

/**
 * Default configuration values
 */
export const ScannerConfigDefaults = {
  DEFAULT_CONCURRENCY: 4,
  DEFAULT_PROBE_TIMEOUT_MS: 30000,
  DEFAULT_CANCEL_GRACE_MS: 5000,
  DEFAULT_MAX_REQUESTS_PER_SECOND: 10,
  DEFAULT_ADVISOR_TIMEOUT_MS: 15000,
  DEFAULT_OLLAMA_ENDPOINT: 'http://localhost:11434',
  DEFAULT_AZURE_API_VERSION: '2024-06-01',
  DEFAULT_RETRY_MAX_RETRIES: 2,
  DEFAULT_RETRY_DELAY_MS: 1000,
  DEFAULT_LOG_LEVEL: 'info',
} as const;

const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();

const ScannerConfigFileSchema = z
  .object({
    concurrency: positiveInt,
    probeTimeoutMs: positiveInt,
    cancelGraceMs: nonNegative,
    maxRequestsPerSecond: nonNegative,
    advisorProvider: z.enum(ADVISOR_PROVIDERS),
    advisorModel: z.string(),
    advisorTimeoutMs: positiveInt,
    allowRemoteProviders: z.boolean(),
    allowedProviders: z.array(z.string()),
    openaiApiKey: z.string(),
    anthropicApiKey: z.string(),
    azureOpenaiApiKey: z.string(),
    azureOpenaiEndpoint: z.string().url(),
    azureOpenaiDeployment: z.string(),
    azureOpenaiApiVersion: z.string(),
    ollamaEndpoint: z.string().url(),
    retryMaxRetries: z.number().int().nonnegative(),
    retryDelayMs: nonNegative,
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .partial()
  .strict();

/**
 * Fill unset options with defaults
 */
export function withDefaults(config: Partial<ScannerConfig> = {}): ScannerConfig {
  return {
    ...config,
    concurrency: config.concurrency ?? ScannerConfigDefaults.DEFAULT_CONCURRENCY,
    probeTimeoutMs:
      config.probeTimeoutMs ?? ScannerConfigDefaults.DEFAULT_PROBE_TIMEOUT_MS,
    cancelGraceMs:
      config.cancelGraceMs ?? ScannerConfigDefaults.DEFAULT_CANCEL_GRACE_MS,
    maxRequestsPerSecond:
      config.maxRequestsPerSecond ??
      ScannerConfigDefaults.DEFAULT_MAX_REQUESTS_PER_SECOND,
    advisorProvider: config.advisorProvider ?? 'none',
    advisorTimeoutMs:
      config.advisorTimeoutMs ?? ScannerConfigDefaults.DEFAULT_ADVISOR_TIMEOUT_MS,
    allowRemoteProviders: config.allowRemoteProviders ?? false,
    logLevel: config.logLevel ?? ScannerConfigDefaults.DEFAULT_LOG_LEVEL,
  };
}

/**
 * Load engine configuration from a YAML or JSON file, then apply
 * environment overrides and defaults
 */
export function loadScannerConfig(path?: string): ScannerConfig {
  let base: Partial<ScannerConfig> = {};

  if (path && existsSync(path)) {
    const content = readFileSync(path, 'utf-8');
    base = parseConfigFile(content, path);
  }

  return withDefaults(applyEnvOverrides(base));
}

/**
 * Parse and validate configuration file content
 */
export function parseConfigFile(
  content: string,
  path: string
): Partial<ScannerConfig> {
  let raw: unknown;
  try {
    raw = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${path}`, toError(error));
  }

  // An empty YAML document parses to null
  if (raw === null || raw === undefined) return {};

  const result = ScannerConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Apply environment variable overrides to configuration
 */
function applyEnvOverrides(
  config: Partial<ScannerConfig>
): Partial<ScannerConfig> {
  const cfg = { ...config };

  const concurrency = envInt('SCAN_CONCURRENCY');
  if (concurrency !== undefined && concurrency > 0) cfg.concurrency = concurrency;

  const probeTimeoutMs = envInt('PROBE_TIMEOUT_MS');
  if (probeTimeoutMs !== undefined && probeTimeoutMs > 0)
    cfg.probeTimeoutMs = probeTimeoutMs;

  const cancelGraceMs = envInt('CANCEL_GRACE_MS');
  if (cancelGraceMs !== undefined && cancelGraceMs >= 0)
    cfg.cancelGraceMs = cancelGraceMs;

  const maxRequestsPerSecond = envFloat('MAX_REQUESTS_PER_SECOND');
  if (maxRequestsPerSecond !== undefined && maxRequestsPerSecond >= 0)
    cfg.maxRequestsPerSecond = maxRequestsPerSecond;

  const provider = envString('ADVISOR_PROVIDER')?.toLowerCase();
  if (provider) cfg.advisorProvider = parseProvider(provider);

  const advisorModel = envString('ADVISOR_MODEL');
  if (advisorModel) cfg.advisorModel = advisorModel;

  const advisorTimeoutMs = envInt('ADVISOR_TIMEOUT_MS');
  if (advisorTimeoutMs !== undefined && advisorTimeoutMs > 0)
    cfg.advisorTimeoutMs = advisorTimeoutMs;

  if ('ALLOW_REMOTE_PROVIDERS' in process.env) {
    cfg.allowRemoteProviders = envBool(
      'ALLOW_REMOTE_PROVIDERS',
      cfg.allowRemoteProviders ?? false
    );
  }

  const allowedProviders = envList('ALLOWED_PROVIDERS');
  if (allowedProviders) cfg.allowedProviders = allowedProviders;

  const openaiKey = envString('OPENAI_API_KEY');
  if (openaiKey) cfg.openaiApiKey = openaiKey;

  const anthropicKey = envString('ANTHROPIC_API_KEY');
  if (anthropicKey) cfg.anthropicApiKey = anthropicKey;

  const azureKey = envString('AZURE_OPENAI_API_KEY');
  if (azureKey) cfg.azureOpenaiApiKey = azureKey;

  const azureEndpoint = envString('AZURE_OPENAI_ENDPOINT');
  if (azureEndpoint) cfg.azureOpenaiEndpoint = azureEndpoint;

  const azureDeployment = envString('AZURE_OPENAI_DEPLOYMENT_NAME');
  if (azureDeployment) cfg.azureOpenaiDeployment = azureDeployment;

  const azureApiVersion = envString('AZURE_OPENAI_API_VERSION');
  if (azureApiVersion) cfg.azureOpenaiApiVersion = azureApiVersion;

  const ollamaEndpoint = envString('OLLAMA_ENDPOINT');
  if (ollamaEndpoint) cfg.ollamaEndpoint = ollamaEndpoint;

  const retryMaxRetries = envInt('RETRY_MAX_RETRIES');
  if (retryMaxRetries !== undefined) cfg.retryMaxRetries = retryMaxRetries;

  const retryDelayMs = envInt('RETRY_DELAY_MS');
  if (retryDelayMs !== undefined) cfg.retryDelayMs = retryDelayMs;

  const logLevel = envString('LOG_LEVEL')?.toLowerCase();
  const matchedLevel = LOG_LEVELS.find((level) => level === logLevel);
  if (matchedLevel) cfg.logLevel = matchedLevel;

  return cfg;
}

function parseProvider(value: string): AdvisorProvider {
  const provider = ADVISOR_PROVIDERS.find((candidate) => candidate === value);
  if (!provider) {
    throw new ConfigError(
      `Unsupported ADVISOR_PROVIDER ${value}; expected one of ${ADVISOR_PROVIDERS.join(', ')}`
    );
  }
  return provider;
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() ? value.trim() : undefined;
}

function envList(key: string): string[] | undefined {
  const raw = envString(key);
  if (!raw) return undefined;
  const list = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s);
  return list.length > 0 ? list : undefined;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return defaultValue;
}

function envInt(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envFloat(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}
