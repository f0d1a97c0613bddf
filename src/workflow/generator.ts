/**
 * Artifact Generator
 *
 * First pass of the workflow: load the dataset, prompt the generation model
 * and return the V1 chart in memory. Persisting it is the orchestrator's job.
 */

import type { Artifact, WorkflowRequest } from '../types.js';
import { caseId, requestContext } from '../types.js';
import { loadDataset, describeSchema, sampleRows, type Dataset } from '../data/dataset.js';
import { suggestInstruction } from '../data/instruction.js';
import {
  createContentModel,
  invokeModel,
  type ContentModelFactory,
} from '../providers/content-model.js';
import type { CallLimiter } from '../utilities/call-limiter.js';
import { CHART_PROMPTS, type PromptContext } from './prompts.js';
import { extractSvg, parseGenerationHeader } from './response-parser.js';
import {
  CancellationError,
  DataUnavailableError,
  GenerationFailure,
  ModelTimeoutError,
  WorkflowError,
  toError,
} from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

export const SVG_MIME_TYPE = 'image/svg+xml';
export const SVG_EXTENSION = 'svg';

export interface ModelCallSettings {
  /** Resolves model ids; defaults to the provider registry */
  models?: ContentModelFactory;
  /** Per-call time budget */
  timeoutMs: number;
  /** Shared bound on concurrent model calls */
  limiter?: CallLimiter;
  logger?: StructuredLogger;
}

export interface GeneratorOptions extends ModelCallSettings {
  /** Rows of the dataset shown to the model */
  sampleRows: number;
}

/**
 * V1 plus the parameters used to produce it.
 */
export interface Generation {
  artifact: Artifact;
  dataset: Dataset;
  context: PromptContext;
}

export class ArtifactGenerator {
  private models: ContentModelFactory;
  private log: StructuredLogger;

  constructor(private readonly options: GeneratorOptions) {
    this.models = options.models ?? createContentModel;
    this.log = options.logger ?? createComponentLogger('generator');
  }

  /**
   * Produce the V1 artifact for a request.
   *
   * @throws DataUnavailableError if the dataset cannot be read
   * @throws GenerationFailure if the model errors, times out or returns no usable SVG
   * @throws CancellationError if the run is aborted
   */
  async generate(request: WorkflowRequest, options: { signal?: AbortSignal } = {}): Promise<Generation> {
    const context = requestContext(request);
    const log = this.log.forCase(caseId(request));

    let dataset: Dataset;
    try {
      dataset = await loadDataset(request.datasetReference, { signal: options.signal });
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        throw new DataUnavailableError(error.message, { ...error.context, ...context }, error.cause);
      }
      throw error;
    }

    const instruction = request.instruction.trim() || suggestInstruction(dataset);
    if (!request.instruction.trim()) {
      log.info('No instruction given, using a suggested one', { instruction });
    }

    const promptContext: PromptContext = {
      schema: describeSchema(dataset),
      sampleRowsJson: sampleRows(dataset, this.options.sampleRows),
    };

    let content: string;
    try {
      const model = this.models(request.generationModel);
      content = await invokeModel(model, CHART_PROMPTS.generation(instruction, promptContext), {
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
        limiter: this.options.limiter,
      });
    } catch (error) {
      throw toGenerationFailure(error, request.generationModel, context);
    }

    const svg = extractSvg(content);
    if (!svg) {
      throw new GenerationFailure(
        `Model "${request.generationModel}" returned no usable SVG`,
        { ...context, model: request.generationModel, responseLength: content.length }
      );
    }

    const { description } = parseGenerationHeader(content);
    log.debug('Generated V1', { bytes: Buffer.byteLength(svg), description });

    const artifact: Artifact = Object.freeze({
      version: 'v1',
      payload: Buffer.from(svg, 'utf-8'),
      mimeType: SVG_MIME_TYPE,
      extension: SVG_EXTENSION,
      request,
      model: request.generationModel,
      instruction,
      description,
    });

    return { artifact, dataset, context: promptContext };
  }
}

function toGenerationFailure(error: unknown, model: string, context: Record<string, unknown>): WorkflowError {
  if (error instanceof CancellationError) {
    return new CancellationError(error.reason, { ...context, model });
  }
  const cause = toError(error);
  return new GenerationFailure(
    `Generation with "${model}" failed: ${cause.message}`,
    { ...context, model },
    cause,
    error instanceof ModelTimeoutError
  );
}
