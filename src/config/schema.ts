/**
 * Zod schema for user-facing configuration (config.json).
 *
 * Validates what users write in `~/.config/chart-reflect/config.json` or
 * `.chart-reflect/config.json`. Every field is optional; missing ones fall
 * back to DEFAULT_SETTINGS.
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../utilities/logger.js';

const positiveInt = z.number().int().positive();

export const WorkflowConfigSchema = z.object({
  generationModel: z.string().min(1).optional(),
  reflectionModel: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  caseLabel: z.string().min(1).optional(),
  sampleRows: positiveInt.optional(),
  concurrency: positiveInt.optional(),
  maxModelCalls: positiveInt.optional(),
  timeoutMs: positiveInt.optional(),
  overwrite: z.boolean().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

export const CONFIG_KEYS = Object.keys(WorkflowConfigSchema.shape);

/**
 * Fully resolved settings after defaults, files, environment and flags.
 */
export interface Settings {
  generationModel: string;
  reflectionModel: string;
  outputDir: string;
  caseLabel: string;
  sampleRows: number;
  concurrency: number;
  maxModelCalls: number;
  timeoutMs: number;
  overwrite: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  generationModel: 'gpt-4o-mini',
  reflectionModel: 'gpt-4o',
  outputDir: '.',
  caseLabel: 'chart',
  sampleRows: 5,
  concurrency: 2,
  maxModelCalls: 4,
  timeoutMs: 60_000,
  overwrite: false,
  logLevel: 'info',
});

