/**
 * Console Reporter
 *
 * One line per finished request, then a summary block.
 */

import chalk from 'chalk';
import type { BatchSummary, WorkflowResult, WorkflowStatus } from '../types.js';
import { caseId } from '../types.js';
import type { Reporter } from './types.js';

export interface ConsoleReporterOptions {
  /** Where to write (default process.stdout) */
  write?: (text: string) => void;
  /** List critique findings under each successful request */
  showFindings?: boolean;
}

const STATUS_LABEL: Record<WorkflowStatus, string> = {
  success: chalk.green('✓ success'),
  degraded_no_v2: chalk.yellow('~ degraded (V1 only)'),
  failed: chalk.red('✗ failed'),
};

export function formatResult(result: WorkflowResult, showFindings = true): string {
  const lines = [`${STATUS_LABEL[result.status]} ${chalk.bold(caseId(result.request))} ${chalk.dim(`${result.durationMs}ms`)}`];

  if (result.v1?.path) lines.push(`    v1: ${result.v1.path}`);
  if (result.v2?.path) lines.push(`    v2: ${result.v2.path}`);

  if (showFindings && result.critique) {
    const verdict = result.critique.accepted ? 'V1 accepted' : 'V1 revised';
    lines.push(chalk.dim(`    critique (${verdict}):`));
    for (const finding of result.critique.findings) {
      lines.push(chalk.dim(`      - ${finding}`));
    }
  }

  if (result.error) {
    lines.push(`    ${chalk.red(`${result.error.name}: ${result.error.message}`)}`);
  }

  return lines.join('\n');
}

export function formatSummary(summary: BatchSummary): string {
  return [
    '',
    '═'.repeat(50),
    'SUMMARY',
    '═'.repeat(50),
    `Requests:  ${summary.total}`,
    `Success:   ${chalk.green(String(summary.success))}`,
    `Degraded:  ${chalk.yellow(String(summary.degraded))}`,
    `Failed:    ${chalk.red(String(summary.failed))}`,
    `Total time: ${(summary.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}

export class ConsoleReporter implements Reporter {
  private write: (text: string) => void;
  private showFindings: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.showFindings = options.showFindings ?? true;
  }

  reportResult(result: WorkflowResult): void {
    this.write(`${formatResult(result, this.showFindings)}\n`);
  }

  reportSummary(_results: readonly WorkflowResult[], summary: BatchSummary): void {
    this.write(`${formatSummary(summary)}\n`);
  }

  async finalize(): Promise<void> {
    // Nothing buffered
  }
}
