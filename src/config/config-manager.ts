/**
 * Unified Configuration Loader
 *
 * Single entry point for loading, merging and validating configuration from
 * user-level (~/.config/chart-reflect/config.json) and project-level
 * (.chart-reflect/config.json) files, then the CHART_REFLECT_* environment.
 *
 * Priority: defaults ← user ← project ← environment. CLI flags are applied
 * on top by the caller.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { isLogLevel } from '../utilities/logger.js';
import { toError } from '../errors/index.js';
import {
  CONFIG_KEYS,
  DEFAULT_SETTINGS,
  WorkflowConfigSchema,
  type Settings,
  type WorkflowConfig,
} from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip the user-level config file */
  skipUser?: boolean;
}

export interface ConfigLoadResult {
  /** Defaults merged with every source */
  settings: Settings;
  /** Files that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

// =============================================================================
// FILE LOADING
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Parse errors are collected as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${toError(err).message}`);
    return null;
  }

  if (!isRecord(parsed)) {
    warnings.push(`${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
    return null;
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw config object. Unknown keys and invalid values are reported
 * and dropped; the remaining fields are kept.
 */
export function validateConfig(raw: Record<string, unknown>, source: string, warnings: string[]): WorkflowConfig {
  for (const key of Object.keys(raw)) {
    if (!CONFIG_KEYS.includes(key)) {
      warnings.push(`${source}: unknown setting "${key}" ignored`);
    }
  }

  const result = WorkflowConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const invalid = new Set<string>();
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`${source}: ${path}: ${issue.message}`);
    const [field] = issue.path;
    if (field !== undefined) invalid.add(String(field));
  }

  const kept = Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)));
  const retry = WorkflowConfigSchema.safeParse(kept);
  return retry.success ? retry.data : {};
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

/**
 * Read CHART_REFLECT_* overrides from the environment.
 */
export function readEnvironmentConfig(env: NodeJS.ProcessEnv, warnings: string[]): WorkflowConfig {
  const config: WorkflowConfig = {};

  if (env.CHART_REFLECT_GENERATION_MODEL) config.generationModel = env.CHART_REFLECT_GENERATION_MODEL;
  if (env.CHART_REFLECT_REFLECTION_MODEL) config.reflectionModel = env.CHART_REFLECT_REFLECTION_MODEL;
  if (env.CHART_REFLECT_OUTPUT_DIR) config.outputDir = env.CHART_REFLECT_OUTPUT_DIR;

  const level = env.CHART_REFLECT_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) {
      config.logLevel = level;
    } else {
      warnings.push(`CHART_REFLECT_LOG_LEVEL: unknown level "${level}" ignored`);
    }
  }

  return config;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Resolve settings from defaults, config files and the environment.
 * Validation problems never throw; they come back as warnings.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, env = process.env, skipUser = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];
  const layers: WorkflowConfig[] = [];

  if (!skipUser) {
    const userConfigPath = getConfigPath(env);
    const userRaw = loadJsonFile(userConfigPath, warnings);
    sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });
    if (userRaw) layers.push(validateConfig(userRaw, userConfigPath, warnings));
  }

  const projectConfigPath = join(getProjectDir(cwd), 'config.json');
  const projectRaw = loadJsonFile(projectConfigPath, warnings);
  sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  if (projectRaw) layers.push(validateConfig(projectRaw, projectConfigPath, warnings));

  layers.push(readEnvironmentConfig(env, warnings));

  return { settings: mergeSettings(DEFAULT_SETTINGS, ...layers), sources, warnings };
}

/**
 * Apply config layers left to right; undefined fields leave the base value.
 */
export function mergeSettings(base: Readonly<Settings>, ...layers: WorkflowConfig[]): Settings {
  const settings: Settings = { ...base };
  for (const layer of layers) {
    settings.generationModel = layer.generationModel ?? settings.generationModel;
    settings.reflectionModel = layer.reflectionModel ?? settings.reflectionModel;
    settings.outputDir = layer.outputDir ?? settings.outputDir;
    settings.caseLabel = layer.caseLabel ?? settings.caseLabel;
    settings.sampleRows = layer.sampleRows ?? settings.sampleRows;
    settings.concurrency = layer.concurrency ?? settings.concurrency;
    settings.maxModelCalls = layer.maxModelCalls ?? settings.maxModelCalls;
    settings.timeoutMs = layer.timeoutMs ?? settings.timeoutMs;
    settings.overwrite = layer.overwrite ?? settings.overwrite;
    settings.logLevel = layer.logLevel ?? settings.logLevel;
  }
  return settings;
}
