/**
 * Reflection Evaluator
 *
 * Second pass of the workflow: show the reflection model the instruction,
 * the dataset context and the V1 markup, collect its findings and the
 * revised chart (V2).
 */

import type { Artifact, Critique, Reflection, WorkflowRequest } from '../types.js';
import { caseId, requestContext } from '../types.js';
import { loadDataset, describeSchema, sampleRows } from '../data/dataset.js';
import { createContentModel, invokeModel, type ContentModelFactory } from '../providers/content-model.js';
import { CHART_PROMPTS, type PromptContext } from './prompts.js';
import { extractSvg, parseCritiqueHeader } from './response-parser.js';
import { SVG_EXTENSION, SVG_MIME_TYPE, type GeneratorOptions } from './generator.js';
import {
  CancellationError,
  EvaluationFailure,
  ModelTimeoutError,
  WorkflowError,
  toError,
} from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

export type EvaluatorOptions = GeneratorOptions;

export interface ReflectOptions {
  /** Prompt context from the generation pass; the dataset is reloaded without it */
  context?: PromptContext;
  signal?: AbortSignal;
}

export class ReflectionEvaluator {
  private models: ContentModelFactory;
  private log: StructuredLogger;

  constructor(private readonly options: EvaluatorOptions) {
    this.models = options.models ?? createContentModel;
    this.log = options.logger ?? createComponentLogger('evaluator');
  }

  /**
   * Critique V1 and produce V2.
   *
   * @throws EvaluationFailure if V1 does not belong to the request, the model
   *   errors or times out, or its answer lacks a critique or a distinct revision
   * @throws CancellationError if the run is aborted
   */
  async reflect(request: WorkflowRequest, v1: Artifact, options: ReflectOptions = {}): Promise<Reflection> {
    const context = { ...requestContext(request), model: request.reflectionModel };

    if (v1.version !== 'v1' || !sameCase(v1.request, request)) {
      throw new EvaluationFailure(
        'Reflection needs the V1 artifact generated for this dataset and instruction',
        { ...context, artifactVersion: v1.version, artifactDataset: v1.request.datasetReference }
      );
    }

    const draftSvg = v1.payload.toString('utf-8');

    let content: string;
    try {
      const promptContext = options.context ?? (await this.loadContext(request, options.signal));
      const model = this.models(request.reflectionModel);
      content = await invokeModel(
        model,
        CHART_PROMPTS.reflection(v1.instruction, promptContext, { description: v1.description, svg: draftSvg }),
        { timeoutMs: this.options.timeoutMs, signal: options.signal, limiter: this.options.limiter }
      );
    } catch (error) {
      throw toEvaluationFailure(error, request.reflectionModel, context);
    }

    const header = parseCritiqueHeader(content);
    if (!header) {
      throw new EvaluationFailure(
        `Model "${request.reflectionModel}" returned no critique header`,
        { ...context, responseLength: content.length }
      );
    }

    const svg = extractSvg(content);
    if (!svg) {
      throw new EvaluationFailure(`Model "${request.reflectionModel}" returned no revised SVG`, context);
    }

    const payload = Buffer.from(svg, 'utf-8');
    if (payload.equals(v1.payload)) {
      throw new EvaluationFailure(`Model "${request.reflectionModel}" returned V1 unchanged`, context);
    }

    const critique: Critique = Object.freeze({
      target: v1,
      findings: Object.freeze([...header.findings]),
      accepted: header.accepted,
    });

    const revised: Artifact = Object.freeze({
      version: 'v2',
      payload,
      mimeType: SVG_MIME_TYPE,
      extension: SVG_EXTENSION,
      request,
      model: request.reflectionModel,
      instruction: v1.instruction,
      description: header.description ?? v1.description,
    });

    this.log.forCase(caseId(request)).debug('Reflected on V1', { findings: critique.findings.length, accepted: critique.accepted });
    return { critique, revised };
  }

  private async loadContext(request: WorkflowRequest, signal?: AbortSignal): Promise<PromptContext> {
    const dataset = await loadDataset(request.datasetReference, { signal });
    return {
      schema: describeSchema(dataset),
      sampleRowsJson: sampleRows(dataset, this.options.sampleRows),
    };
  }
}

function sameCase(a: WorkflowRequest, b: WorkflowRequest): boolean {
  return a === b || (a.datasetReference === b.datasetReference && a.instruction === b.instruction);
}

function toEvaluationFailure(error: unknown, model: string, context: Record<string, unknown>): WorkflowError {
  if (error instanceof CancellationError) {
    return new CancellationError(error.reason, context);
  }
  const cause = toError(error);
  return new EvaluationFailure(
    `Reflection with "${model}" failed: ${cause.message}`,
    { ...context, model },
    cause,
    error instanceof ModelTimeoutError
  );
}
