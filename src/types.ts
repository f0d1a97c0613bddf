/**
 * Core workflow types.
 */

import type { WorkflowError } from './errors/index.js';

// =============================================================================
// REQUESTS
// =============================================================================

/**
 * One dataset + instruction pair to process. Frozen once created.
 */
export interface WorkflowRequest {
  /** File path, `file://` URL or `http(s)://` URL of a CSV/TSV file */
  readonly datasetReference: string;
  readonly instruction: string;
  readonly generationModel: string;
  readonly reflectionModel: string;
  readonly outputDirectory: string;
  /** Case label used in artifact file names (default `chart`) */
  readonly caseLabel: string;
  /** Optional sub-directory grouping related cases */
  readonly caseGroup?: string;
  /** Replace artifacts left by a prior run */
  readonly overwrite: boolean;
}

export type WorkflowRequestInput =
  Pick<WorkflowRequest, 'datasetReference' | 'instruction' | 'generationModel' | 'reflectionModel' | 'outputDirectory'>
  & Partial<Pick<WorkflowRequest, 'caseLabel' | 'caseGroup' | 'overwrite'>>;

export const DEFAULT_CASE_LABEL = 'chart';

/**
 * Build an immutable request, filling defaults.
 */
export function createWorkflowRequest(input: WorkflowRequestInput): WorkflowRequest {
  return Object.freeze({
    datasetReference: input.datasetReference,
    instruction: input.instruction,
    generationModel: input.generationModel,
    reflectionModel: input.reflectionModel,
    outputDirectory: input.outputDirectory,
    caseLabel: input.caseLabel ?? DEFAULT_CASE_LABEL,
    ...(input.caseGroup !== undefined && { caseGroup: input.caseGroup }),
    overwrite: input.overwrite ?? false,
  });
}

// =============================================================================
// ARTIFACTS
// =============================================================================

export type ArtifactVersion = 'v1' | 'v2';

export interface Artifact {
  readonly version: ArtifactVersion;
  readonly payload: Buffer;
  readonly mimeType: string;
  /** File extension without the dot */
  readonly extension: string;
  readonly request: WorkflowRequest;
  /** Model that produced the payload */
  readonly model: string;
  /** Instruction the payload answers (suggested when the request had none) */
  readonly instruction: string;
  /** The model's one-line summary of the chart */
  readonly description: string;
  /** Final path once persisted */
  readonly path?: string;
}

export interface Critique {
  /** The V1 artifact being judged */
  readonly target: Artifact;
  /** Concrete deficiencies, in the order the evaluator reported them */
  readonly findings: readonly string[];
  /** Whether V1 already met the instruction; reported only */
  readonly accepted: boolean;
}

export interface Reflection {
  critique: Critique;
  revised: Artifact;
}

// =============================================================================
// RESULTS
// =============================================================================

export type WorkflowStatus = 'success' | 'degraded_no_v2' | 'failed';

export interface WorkflowResult {
  request: WorkflowRequest;
  v1: Artifact | null;
  v2: Artifact | null;
  critique: Critique | null;
  status: WorkflowStatus;
  /** Why the run degraded or failed */
  error: WorkflowError | null;
  durationMs: number;
}

export interface BatchSummary {
  total: number;
  success: number;
  degraded: number;
  failed: number;
  durationMs: number;
}

/**
 * Identifies a request in logs and reports: `group/dataset:label`.
 */
export function caseId(request: WorkflowRequest): string {
  const dataset = request.datasetReference.split(/[\\/]/).pop() ?? request.datasetReference;
  return `${request.caseGroup ? `${request.caseGroup}/` : ''}${dataset}:${request.caseLabel}`;
}

/**
 * Context attached to every error raised for a request.
 */
export function requestContext(request: WorkflowRequest): Record<string, unknown> {
  return {
    dataset: request.datasetReference,
    caseLabel: request.caseLabel,
    ...(request.caseGroup !== undefined && { caseGroup: request.caseGroup }),
  };
}

export function summarize(results: readonly WorkflowResult[], durationMs: number): BatchSummary {
  return {
    total: results.length,
    success: results.filter((r) => r.status === 'success').length,
    degraded: results.filter((r) => r.status === 'degraded_no_v2').length,
    failed: results.filter((r) => r.status === 'failed').length,
    durationMs,
  };
}
