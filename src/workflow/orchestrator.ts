/**
 * Workflow Orchestrator
 *
 * Runs a batch of requests through Generator → Evaluator with bounded
 * parallelism. Uses a Promise.race dispatch loop to keep `concurrency`
 * requests in flight; every model call additionally goes through one shared
 * CallLimiter.
 *
 * Failure policy:
 * - conflict, dataset or generation failure → `failed`, evaluator skipped
 * - evaluation failure (or V2 write failure) → `degraded_no_v2`, V1 kept
 * - a single request never makes `run` throw
 *
 * Aborting the signal stops dispatching; in-flight model calls are aborted
 * and requests that never started are recorded as `failed`.
 */

import type { Artifact, BatchSummary, Critique, WorkflowRequest, WorkflowResult, WorkflowStatus } from '../types.js';
import { caseId, requestContext, summarize } from '../types.js';
import { ArtifactGenerator } from './generator.js';
import { ReflectionEvaluator } from './evaluator.js';
import { assertWritable, persist } from './artifact-store.js';
import type { ContentModelFactory } from '../providers/content-model.js';
import { CallLimiter } from '../utilities/call-limiter.js';
import { CancellationError, WorkflowError, toError, wrapError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface OrchestratorOptions {
  /** Requests processed at once */
  concurrency: number;
  /** Model calls in flight at once, across all requests */
  maxModelCalls: number;
  /** Per-call time budget */
  timeoutMs: number;
  /** Dataset rows shown to the models */
  sampleRows: number;
  /** Resolves model ids; defaults to the provider registry */
  models?: ContentModelFactory;
  logger?: StructuredLogger;
  /** Event handler for progress updates */
  onProgress?: (event: WorkflowProgressEvent) => void;
}

export type WorkflowProgressEvent =
  | { type: 'batch.start'; total: number; concurrency: number }
  | { type: 'request.start'; caseId: string; index: number; total: number }
  | { type: 'request.complete'; caseId: string; result: WorkflowResult; index: number; total: number }
  | { type: 'batch.complete'; results: WorkflowResult[]; summary: BatchSummary };

export const DEFAULT_ORCHESTRATOR_OPTIONS = {
  concurrency: 2,
  maxModelCalls: 4,
  timeoutMs: 60_000,
  sampleRows: 5,
} as const satisfies Omit<OrchestratorOptions, 'models' | 'logger' | 'onProgress'>;

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class WorkflowOrchestrator {
  private log: StructuredLogger;

  constructor(private readonly options: OrchestratorOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.log = options.logger ?? createComponentLogger('orchestrator');
  }

  /**
   * Run every request. Results are returned in input order, one per request.
   */
  async run(requests: readonly WorkflowRequest[], options: { signal?: AbortSignal } = {}): Promise<WorkflowResult[]> {
    const { signal } = options;
    const startTime = Date.now();

    // One limiter per run: the bound applies to this batch's calls
    const settings = {
      models: this.options.models,
      timeoutMs: this.options.timeoutMs,
      sampleRows: this.options.sampleRows,
      limiter: new CallLimiter(this.options.maxModelCalls),
    };
    const generator = new ArtifactGenerator(settings);
    const evaluator = new ReflectionEvaluator(settings);

    this.emitProgress({ type: 'batch.start', total: requests.length, concurrency: this.options.concurrency });
    this.log.info('Batch started', {
      requests: requests.length,
      concurrency: this.options.concurrency,
      maxModelCalls: this.options.maxModelCalls,
    });

    const results = await this.dispatchLoop(requests, generator, evaluator, signal);
    const summary = summarize(results, Date.now() - startTime);

    this.emitProgress({ type: 'batch.complete', results, summary });
    this.log.info('Batch complete', { ...summary });

    return results;
  }

  // ---------------------------------------------------------------------------
  // DISPATCH LOOP
  // ---------------------------------------------------------------------------

  private async dispatchLoop(
    requests: readonly WorkflowRequest[],
    generator: ArtifactGenerator,
    evaluator: ReflectionEvaluator,
    signal?: AbortSignal
  ): Promise<WorkflowResult[]> {
    const results = new Array<WorkflowResult | undefined>(requests.length).fill(undefined);
    const active = new Map<number, Promise<{ index: number; result: WorkflowResult }>>();
    let next = 0;

    while (next < requests.length || active.size > 0) {
      // Fill available slots unless the run was cancelled
      while (!signal?.aborted && next < requests.length && active.size < this.options.concurrency) {
        const index = next++;
        const promise = this.runRequest(requests[index], index, requests.length, generator, evaluator, signal)
          .then((result) => ({ index, result }));
        active.set(index, promise);
      }

      if (signal?.aborted && next < requests.length) {
        this.log.warn('Run cancelled, skipping requests not yet started', { skipped: requests.length - next });
        for (; next < requests.length; next++) {
          results[next] = this.notStarted(requests[next], next, requests.length);
        }
      }

      if (active.size > 0) {
        const { index, result } = await Promise.race(active.values());
        active.delete(index);
        results[index] = result;
      }
    }

    return results.map((result, index) => result ?? this.notStarted(requests[index], index, requests.length));
  }

  // ---------------------------------------------------------------------------
  // REQUEST EXECUTION
  // ---------------------------------------------------------------------------

  private async runRequest(
    request: WorkflowRequest,
    index: number,
    total: number,
    generator: ArtifactGenerator,
    evaluator: ReflectionEvaluator,
    signal?: AbortSignal
  ): Promise<WorkflowResult> {
    const id = caseId(request);
    const log = this.log.forCase(id);
    const startTime = Date.now();

    this.emitProgress({ type: 'request.start', caseId: id, index, total });
    log.info(`[${index + 1}/${total}] Starting`, { ...requestContext(request) });

    let v1: Artifact | null = null;
    const finish = (
      status: WorkflowStatus,
      fields: { v2?: Artifact; critique?: Critique; error?: WorkflowError } = {}
    ): WorkflowResult => ({
      request,
      v1,
      v2: fields.v2 ?? null,
      critique: fields.critique ?? null,
      status,
      error: fields.error ?? null,
      durationMs: Date.now() - startTime,
    });

    let result: WorkflowResult;
    try {
      await assertWritable(request);
      const generation = await generator.generate(request, { signal });
      v1 = await persist(generation.artifact);
      log.info('V1 written', { path: v1.path, model: v1.model });

      try {
        const { critique, revised } = await evaluator.reflect(request, v1, { context: generation.context, signal });
        const v2 = await persist(revised);
        log.info('V2 written', { path: v2.path, model: v2.model, findings: critique.findings.length });
        result = finish('success', { v2, critique });
      } catch (error) {
        const err = wrapError(error, requestContext(request));
        log.warn(`Keeping V1 only: ${err.message}`, { error: err.toJSON() });
        result = finish('degraded_no_v2', { error: err });
      }
    } catch (error) {
      const err = wrapError(error, requestContext(request));
      log.error(`Failed: ${err.message}`, { error: err.toJSON() });
      result = finish('failed', { error: err });
    }

    this.emitProgress({ type: 'request.complete', caseId: id, result, index, total });
    log.info(`[${index + 1}/${total}] Finished: ${result.status}`, { durationMs: result.durationMs });
    return result;
  }

  private notStarted(request: WorkflowRequest, index: number, total: number): WorkflowResult {
    const result: WorkflowResult = {
      request,
      v1: null,
      v2: null,
      critique: null,
      status: 'failed',
      error: new CancellationError('Run cancelled before this request started', requestContext(request)),
      durationMs: 0,
    };
    this.emitProgress({ type: 'request.complete', caseId: caseId(request), result, index, total });
    return result;
  }

  /** A failing listener is logged and never fails the run. */
  private emitProgress(event: WorkflowProgressEvent): void {
    try {
      this.options.onProgress?.(event);
    } catch (error) {
      this.log.warn(`Progress listener failed on ${event.type}: ${toError(error).message}`);
    }
  }
}
