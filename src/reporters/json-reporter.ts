/**
 * JSON Reporter
 *
 * Writes the run report: one entry per request with artifact paths, the
 * critique and any error. Payloads are not embedded.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Artifact, BatchSummary, WorkflowResult } from '../types.js';
import { caseId } from '../types.js';
import type { Reporter } from './types.js';

export interface ArtifactReport {
  path: string | null;
  model: string;
  description: string;
  mimeType: string;
  bytes: number;
}

export interface ResultReport {
  case: string;
  dataset: string;
  instruction: string;
  generationModel: string;
  reflectionModel: string;
  status: WorkflowResult['status'];
  durationMs: number;
  v1: ArtifactReport | null;
  v2: ArtifactReport | null;
  critique: { findings: string[]; accepted: boolean } | null;
  error: Record<string, unknown> | null;
}

export interface RunReport {
  generatedAt: string;
  summary: BatchSummary;
  results: ResultReport[];
}

function artifactReport(artifact: Artifact | null): ArtifactReport | null {
  if (!artifact) return null;
  return {
    path: artifact.path ?? null,
    model: artifact.model,
    description: artifact.description,
    mimeType: artifact.mimeType,
    bytes: artifact.payload.length,
  };
}

export function toResultReport(result: WorkflowResult): ResultReport {
  const { request } = result;
  return {
    case: caseId(request),
    dataset: request.datasetReference,
    // The instruction actually used, which differs when one was suggested
    instruction: result.v1?.instruction ?? request.instruction,
    generationModel: request.generationModel,
    reflectionModel: request.reflectionModel,
    status: result.status,
    durationMs: result.durationMs,
    v1: artifactReport(result.v1),
    v2: artifactReport(result.v2),
    critique: result.critique
      ? { findings: [...result.critique.findings], accepted: result.critique.accepted }
      : null,
    error: result.error ? result.error.toJSON() : null,
  };
}

export function buildRunReport(
  results: readonly WorkflowResult[],
  summary: BatchSummary,
  now: Date = new Date()
): RunReport {
  return {
    generatedAt: now.toISOString(),
    summary,
    results: results.map(toResultReport),
  };
}

export class JSONReporter implements Reporter {
  private report: RunReport | null = null;

  constructor(private readonly outputPath: string) {}

  reportResult(_result: WorkflowResult): void {
    // Results are taken from the summary call, in input order
  }

  reportSummary(results: readonly WorkflowResult[], summary: BatchSummary): void {
    this.report = buildRunReport(results, summary);
  }

  async finalize(): Promise<void> {
    if (!this.report) return;
    await fs.mkdir(path.dirname(this.outputPath), { recursive: true });
    await fs.writeFile(this.outputPath, `${JSON.stringify(this.report, null, 2)}\n`);
  }
}
