/**
 * Console and JSON reporter tests.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import {
  ConsoleReporter,
  JSONReporter,
  buildRunReport,
  formatResult,
  formatSummary,
  toResultReport,
} from '../../src/reporters/index.js';
import {
  createWorkflowRequest,
  summarize,
  type Artifact,
  type Critique,
  type WorkflowResult,
} from '../../src/types.js';
import { EvaluationFailure } from '../../src/errors/index.js';
import { makeTempDir, removeDir } from '../helpers/scripted-models.js';

const request = createWorkflowRequest({
  datasetReference: '/data/coffee_sales.csv',
  instruction: '',
  generationModel: 'gen',
  reflectionModel: 'ref',
  outputDirectory: '/out',
  caseGroup: 'coffee',
});

function artifact(version: 'v1' | 'v2', svg: string): Artifact {
  return {
    version,
    payload: Buffer.from(svg, 'utf-8'),
    mimeType: 'image/svg+xml',
    extension: 'svg',
    request,
    model: version === 'v1' ? 'gen' : 'ref',
    instruction: 'Suggested: bar chart of revenue',
    description: `${version} chart`,
    path: `/out/coffee/coffee_sales_chart_${version}.svg`,
  };
}

const v1 = artifact('v1', '<svg>1</svg>');
const v2 = artifact('v2', '<svg>two</svg>');
const critique: Critique = { target: v1, findings: ['No title', 'Bars unsorted'], accepted: false };

const success: WorkflowResult = { request, v1, v2, critique, status: 'success', error: null, durationMs: 1200 };
const degraded: WorkflowResult = {
  request,
  v1,
  v2: null,
  critique: null,
  status: 'degraded_no_v2',
  error: new EvaluationFailure('Model "ref" returned V1 unchanged'),
  durationMs: 800,
};

function plain(text: string): string {
  return stripVTControlCharacters(text);
}

describe('formatResult', () => {
  it('should list paths and findings for a success', () => {
    expect(plain(formatResult(success))).toBe(
      [
        '✓ success coffee/coffee_sales.csv:chart 1200ms',
        '    v1: /out/coffee/coffee_sales_chart_v1.svg',
        '    v2: /out/coffee/coffee_sales_chart_v2.svg',
        '    critique (V1 revised):',
        '      - No title',
        '      - Bars unsorted',
      ].join('\n')
    );
  });

  it('should be able to hide findings', () => {
    expect(plain(formatResult(success, false)).split('\n')).toHaveLength(3);
  });

  it('should show the error for a degraded result', () => {
    expect(plain(formatResult(degraded))).toBe(
      [
        '~ degraded (V1 only) coffee/coffee_sales.csv:chart 800ms',
        '    v1: /out/coffee/coffee_sales_chart_v1.svg',
        '    EvaluationFailure: Model "ref" returned V1 unchanged',
      ].join('\n')
    );
  });
});

describe('formatSummary', () => {
  it('should count each status', () => {
    const text = plain(formatSummary(summarize([success, degraded], 2345)));

    expect(text.split('\n').slice(2)).toEqual([
      'SUMMARY',
      '═'.repeat(50),
      'Requests:  2',
      'Success:   1',
      'Degraded:  1',
      'Failed:    0',
      'Total time: 2.3s',
    ]);
  });
});

describe('ConsoleReporter', () => {
  it('should write one block per result and the summary', async () => {
    const chunks: string[] = [];
    const reporter = new ConsoleReporter({ write: (text) => chunks.push(plain(text)) });

    reporter.reportResult(degraded);
    reporter.reportSummary([degraded], summarize([degraded], 100));
    await reporter.finalize();

    expect(chunks).toHaveLength(2);
    expect(chunks[0].startsWith('~ degraded (V1 only)')).toBe(true);
    expect(chunks[1]).toContain('Degraded:  1');
  });
});

describe('toResultReport', () => {
  it('should report the instruction actually used and artifact metadata', () => {
    const report = toResultReport(success);

    expect(report).toEqual({
      case: 'coffee/coffee_sales.csv:chart',
      dataset: '/data/coffee_sales.csv',
      instruction: 'Suggested: bar chart of revenue',
      generationModel: 'gen',
      reflectionModel: 'ref',
      status: 'success',
      durationMs: 1200,
      v1: {
        path: '/out/coffee/coffee_sales_chart_v1.svg',
        model: 'gen',
        description: 'v1 chart',
        mimeType: 'image/svg+xml',
        bytes: 12,
      },
      v2: {
        path: '/out/coffee/coffee_sales_chart_v2.svg',
        model: 'ref',
        description: 'v2 chart',
        mimeType: 'image/svg+xml',
        bytes: 14,
      },
      critique: { findings: ['No title', 'Bars unsorted'], accepted: false },
      error: null,
    });
  });

  it('should serialise the error', () => {
    const report = toResultReport(degraded);

    expect(report.v2).toBeNull();
    expect(report.error).toMatchObject({
      name: 'EvaluationFailure',
      message: 'Model "ref" returned V1 unchanged',
      category: 'DEPENDENCY',
    });
  });
});

describe('JSONReporter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should write the run report on finalize', async () => {
    const output = join(dir, 'reports', 'run.json');
    const reporter = new JSONReporter(output);
    const summary = summarize([success, degraded], 2000);

    reporter.reportResult(success);
    reporter.reportSummary([success, degraded], summary);
    await reporter.finalize();

    const written: unknown = JSON.parse(await readFile(output, 'utf-8'));
    expect(written).toMatchObject({
      summary: { total: 2, success: 1, degraded: 1, failed: 0, durationMs: 2000 },
      results: [{ status: 'success' }, { status: 'degraded_no_v2' }],
    });
  });

  it('should write nothing without a summary', async () => {
    const output = join(dir, 'never.json');

    await new JSONReporter(output).finalize();

    await expect(readFile(output, 'utf-8')).rejects.toThrow();
  });
});

describe('buildRunReport', () => {
  it('should stamp the report time', () => {
    const report = buildRunReport([], summarize([], 0), new Date('2025-03-01T12:00:00Z'));

    expect(report).toEqual({
      generatedAt: '2025-03-01T12:00:00.000Z',
      summary: { total: 0, success: 0, degraded: 0, failed: 0, durationMs: 0 },
      results: [],
    });
  });
});
