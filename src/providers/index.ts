// Importing the adapters registers them with the provider registry.
import './adapters/mock.js';
import './adapters/anthropic.js';
import './adapters/openrouter.js';
import './adapters/openai.js';

export * from './types.js';
export {
  registerProvider,
  resolveProvider,
  assertCredentials,
  getProviderForModel,
  resetProviderInstances,
  hasEnv,
  requireEnv,
  type ProviderRegistration,
  type ResolvedProvider,
} from './provider.js';
export {
  ProviderContentModel,
  createContentModel,
  invokeModel,
  type ContentModel,
  type ContentModelFactory,
  type ContentPrompt,
  type ContentCallOptions,
  type InvokeOptions,
} from './content-model.js';
export { resilientFetch, ResilientFetchError, MODEL_RETRY_POLICY, type RetryPolicy } from './resilient-fetch.js';
