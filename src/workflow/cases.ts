/**
 * Case files: a JSON description of a batch of requests.
 *
 *   {
 *     "defaults": { "generationModel": "...", "reflectionModel": "...", "outputDir": "out" },
 *     "cases": [{ "group": "coffee", "label": "trend", "dataset": "coffee_sales.csv", "instruction": "..." }]
 *   }
 *
 * Relative dataset and output paths resolve against the case file's
 * directory. Per-case fields win over file defaults, which win over the
 * caller's settings.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { createWorkflowRequest, type WorkflowRequest } from '../types.js';
import { artifactPath } from './artifact-store.js';
import { ConfigurationError, toError } from '../errors/index.js';

const CaseSchema = z.object({
  dataset: z.string().min(1),
  instruction: z.string().default(''),
  label: z.string().min(1).optional(),
  group: z.string().min(1).optional(),
  generationModel: z.string().min(1).optional(),
  reflectionModel: z.string().min(1).optional(),
});

export const CaseFileSchema = z.object({
  defaults: z
    .object({
      generationModel: z.string().min(1).optional(),
      reflectionModel: z.string().min(1).optional(),
      outputDir: z.string().min(1).optional(),
    })
    .strict()
    .default({}),
  cases: z.array(CaseSchema).min(1, 'a case file needs at least one case'),
});

export type CaseFile = z.infer<typeof CaseFileSchema>;

export interface CaseDefaults {
  generationModel: string;
  reflectionModel: string;
  outputDir: string;
  caseLabel: string;
  overwrite: boolean;
}

/**
 * Read and validate a case file.
 *
 * @throws ConfigurationError if the file is unreadable, invalid, or two
 *   cases would write the same artifacts
 */
export async function loadCaseFile(filePath: string, defaults: CaseDefaults): Promise<WorkflowRequest[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read case file ${filePath}: ${toError(error).message}`, ['--cases']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Case file ${filePath} is not valid JSON: ${toError(error).message}`, ['--cases']);
  }

  const parsed = CaseFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(`case file ${filePath}`, parsed.error);
  }

  return buildRequests(parsed.data, dirname(resolve(filePath)), defaults);
}

/**
 * Turn a validated case file into requests.
 */
export function buildRequests(file: CaseFile, baseDir: string, defaults: CaseDefaults): WorkflowRequest[] {
  const outputDir = file.defaults.outputDir ? resolvePath(file.defaults.outputDir, baseDir) : defaults.outputDir;

  const requests = file.cases.map((entry) =>
    createWorkflowRequest({
      datasetReference: resolvePath(entry.dataset, baseDir),
      instruction: entry.instruction,
      generationModel: entry.generationModel ?? file.defaults.generationModel ?? defaults.generationModel,
      reflectionModel: entry.reflectionModel ?? file.defaults.reflectionModel ?? defaults.reflectionModel,
      outputDirectory: outputDir,
      caseLabel: entry.label ?? defaults.caseLabel,
      caseGroup: entry.group,
      overwrite: defaults.overwrite,
    })
  );

  const seen = new Map<string, number>();
  requests.forEach((request, index) => {
    const target = artifactPath(request, 'v1');
    const previous = seen.get(target);
    if (previous !== undefined) {
      throw new ConfigurationError(
        `Cases ${previous + 1} and ${index + 1} would write the same artifacts (${target}); give them distinct labels or groups`,
        ['cases'],
        { path: target }
      );
    }
    seen.set(target, index);
  });

  return requests;
}

function resolvePath(reference: string, baseDir: string): string {
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(reference) || isAbsolute(reference)) {
    return reference;
  }
  return resolve(baseDir, reference);
}
