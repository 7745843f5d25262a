import type { PlanAdvisor } from './PlanAdvisor.js';
import type { AdvisorProvider, ScannerConfig } from '../scanner/ScannerConfig.js';
import type { AdvisorOptions } from './ProviderHttp.js';
import { OpenAIAdvisor } from './OpenAIAdvisor.js';
import { AzureOpenAIAdvisor } from './AzureOpenAIAdvisor.js';
import { AnthropicAdvisor } from './AnthropicAdvisor.js';
import { OllamaAdvisor } from './OllamaAdvisor.js';

/**
 * Default model names for each provider
 */
const DEFAULT_MODELS: Record<Exclude<AdvisorProvider, 'none' | 'azure-openai'>, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-20240620',
  ollama: 'llama3.1',
};

/**
 * Providers that send data off the machine
 */
const REMOTE_PROVIDERS: readonly AdvisorProvider[] = [
  'openai',
  'azure-openai',
  'anthropic',
];

/**
 * Build the configured plan advisor, or null when none is configured
 */
export function buildAdvisor(
  config: ScannerConfig,
  options: AdvisorOptions = {}
): PlanAdvisor | null {
  const provider = config.advisorProvider;

  if (provider === 'none') {
    return null;
  }

  enforceProviderAllowlist(config, provider);

  switch (provider) {
    case 'ollama':
      return new OllamaAdvisor(
        config.advisorModel ?? DEFAULT_MODELS.ollama,
        config,
        options
      );
    case 'openai':
      return new OpenAIAdvisor(
        config.advisorModel ?? DEFAULT_MODELS.openai,
        requireKey(provider, config.openaiApiKey),
        config,
        options
      );
    case 'anthropic':
      return new AnthropicAdvisor(
        config.advisorModel ?? DEFAULT_MODELS.anthropic,
        requireKey(provider, config.anthropicApiKey),
        config,
        options
      );
    case 'azure-openai': {
      const endpoint = config.azureOpenaiEndpoint;
      const deployment = config.azureOpenaiDeployment ?? config.advisorModel;
      if (!endpoint || !deployment) {
        throw new Error(
          'Provider azure-openai requires an endpoint and a deployment name'
        );
      }
      return new AzureOpenAIAdvisor(
        endpoint,
        deployment,
        requireKey(provider, config.azureOpenaiApiKey),
        config,
        options
      );
    }
  }
}

function requireKey(provider: AdvisorProvider, key: string | undefined): string {
  if (!key) {
    throw new Error(`API key missing for provider ${provider}`);
  }
  return key;
}

/**
 * Enforce provider allowlist configuration
 */
function enforceProviderAllowlist(
  config: ScannerConfig,
  provider: AdvisorProvider
): void {
  // Ollama is self-hosted
  if (!REMOTE_PROVIDERS.includes(provider)) {
    return;
  }

  if (!config.allowRemoteProviders) {
    throw new Error(
      `Provider ${provider} disallowed: allowRemoteProviders=false`
    );
  }

  if (config.allowedProviders) {
    const allowed = config.allowedProviders.map((p) => p.toLowerCase());
    if (!allowed.includes(provider)) {
      throw new Error(`Provider ${provider} not in allowedProviders`);
    }
  }
}

/**
 * Get the default model name for a provider
 */
export function getDefaultModel(provider: AdvisorProvider): string | null {
  switch (provider) {
    case 'openai':
    case 'anthropic':
    case 'ollama':
      return DEFAULT_MODELS[provider];
    default:
      return null;
  }
}
