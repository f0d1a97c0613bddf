/**
 * chart-reflect library entry.
 *
 * Importing this module registers the built-in providers.
 */

import './providers/index.js';

export * from './types.js';
export * from './errors/index.js';

export { ArtifactGenerator, SVG_MIME_TYPE, SVG_EXTENSION, type Generation, type GeneratorOptions, type ModelCallSettings } from './workflow/generator.js';
export { ReflectionEvaluator, type EvaluatorOptions, type ReflectOptions } from './workflow/evaluator.js';
export {
  WorkflowOrchestrator,
  DEFAULT_ORCHESTRATOR_OPTIONS,
  type OrchestratorOptions,
  type WorkflowProgressEvent,
} from './workflow/orchestrator.js';
export { artifactPath, assertWritable, persist } from './workflow/artifact-store.js';
export { loadCaseFile, buildRequests, CaseFileSchema, type CaseFile, type CaseDefaults } from './workflow/cases.js';
export { CHART_PROMPTS, type PromptContext } from './workflow/prompts.js';

export { loadDataset, describeSchema, sampleRows, datasetStem, type Dataset, type DatasetColumn } from './data/dataset.js';
export { suggestInstruction } from './data/instruction.js';

export {
  createContentModel,
  invokeModel,
  ProviderContentModel,
  resolveProvider,
  assertCredentials,
  registerProvider,
  type ContentModel,
  type ContentModelFactory,
  type ContentPrompt,
} from './providers/index.js';

export { CallLimiter, type LimiterStats } from './utilities/call-limiter.js';
export { StructuredLogger, MemorySink, ConsoleSink, configureLogger, logger, type LogLevel } from './utilities/logger.js';
export { loadConfig, DEFAULT_SETTINGS, type Settings } from './config/index.js';
export { initializeEnvironment, checkCredentials, type EnvironmentReport } from './env.js';
export { runApp, type AppOptions, type AppOutcome } from './app.js';
