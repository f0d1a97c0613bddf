/**
 * Provider Registry
 *
 * Adapters register themselves on import; a model identifier is routed to
 * the first registered provider (by priority) whose matcher accepts it.
 *
 * Routing (by priority):
 * 0. mock        - `mock` or `mock:<variant>`
 * 1. anthropic   - `claude-*`
 * 2. openrouter  - any `vendor/model` id
 * 100. openai    - everything else (`gpt-4o`, `o4-mini`, ...)
 */

import type { LLMProvider, ProviderName } from './types.js';
import { ConfigurationError } from '../errors/index.js';

// =============================================================================
// PROVIDER REGISTRY
// =============================================================================

export interface ProviderRegistration {
  /** Lower = consulted first */
  priority: number;
  /** Environment variable holding the API key; absent for keyless providers */
  envKey?: string;
  /** Whether this provider serves the given model identifier */
  matches: (model: string) => boolean;
  create: () => LLMProvider;
}

const providers: Map<ProviderName, ProviderRegistration> = new Map();

/**
 * Register a provider. Each adapter calls this at module load.
 */
export function registerProvider(name: ProviderName, registration: ProviderRegistration): void {
  providers.set(name, registration);
}

// =============================================================================
// MODEL ROUTING
// =============================================================================

export interface ResolvedProvider {
  name: ProviderName;
  envKey?: string;
}

/**
 * Find which provider serves a model id, without checking credentials.
 */
export function resolveProvider(model: string): ResolvedProvider {
  const sorted = [...providers.entries()].sort((a, b) => a[1].priority - b[1].priority);

  for (const [name, registration] of sorted) {
    if (registration.matches(model)) {
      return { name, envKey: registration.envKey };
    }
  }

  throw new ConfigurationError(
    `No registered provider serves model "${model}"`,
    ['model'],
    { model, registered: [...providers.keys()] }
  );
}

/**
 * Check that every model has a provider and that its API key is present.
 * Runs once at startup, before any model call.
 */
export function assertCredentials(models: Iterable<string>): ResolvedProvider[] {
  const resolved = new Map<ProviderName, ResolvedProvider>();

  for (const model of models) {
    const provider = resolveProvider(model);
    if (provider.envKey && !hasEnv(provider.envKey)) {
      throw ConfigurationError.missingCredential(provider.envKey, model);
    }
    resolved.set(provider.name, provider);
  }

  return [...resolved.values()];
}

const instances: Map<ProviderName, LLMProvider> = new Map();

/**
 * Get (or lazily create) the provider instance serving a model.
 */
export function getProviderForModel(model: string): LLMProvider {
  const { name, envKey } = resolveProvider(model);

  const cached = instances.get(name);
  if (cached) return cached;

  if (envKey && !hasEnv(envKey)) {
    throw ConfigurationError.missingCredential(envKey, model);
  }

  const registration = providers.get(name);
  if (!registration) {
    throw new ConfigurationError(`Provider "${name}" is not registered`, ['model'], { model });
  }

  const provider = registration.create();
  instances.set(name, provider);
  return provider;
}

/**
 * Drop cached provider instances (tests, or after credentials change).
 */
export function resetProviderInstances(): void {
  instances.clear();
}

// =============================================================================
// ENVIRONMENT HELPERS
// =============================================================================

/**
 * Check if an environment variable is set and non-empty.
 */
export function hasEnv(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value.trim() !== '';
}

/**
 * Read an adapter's API key, or fail naming the variable.
 */
export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value || value.trim() === '') {
    throw new ConfigurationError(`Missing required environment variable: ${key}`, [key]);
  }
  return value;
}
