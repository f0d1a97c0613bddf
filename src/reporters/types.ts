import type { BatchSummary, WorkflowResult } from '../types.js';

export interface Reporter {
  reportResult(result: WorkflowResult): void;
  reportSummary(results: readonly WorkflowResult[], summary: BatchSummary): void;
  finalize(): Promise<void>;
}
