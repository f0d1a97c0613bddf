/**
 * Dataset Loader
 *
 * Resolves a dataset reference (path, `file://` or `http(s)://` URL) to a
 * parsed CSV/TSV table and renders the compact schema text and row sample
 * that condition the prompts.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CancellationError, DataUnavailableError, toError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type ColumnType = 'number' | 'boolean' | 'date' | 'string';

export interface DatasetColumn {
  name: string;
  type: ColumnType;
  /** Number of distinct non-empty values */
  distinct: number;
  /** First non-empty value, if any */
  example?: string;
}

export interface Dataset {
  reference: string;
  /** File name without extension, used in artifact names */
  stem: string;
  columns: DatasetColumn[];
  rows: Array<Record<string, string>>;
}

export interface LoadDatasetOptions {
  signal?: AbortSignal;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const RecordsSchema = z.array(z.array(z.string()));

const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$|^\d{1,2}\/\d{1,2}\/\d{2,4}$/;

// =============================================================================
// LOADING
// =============================================================================

/**
 * Load and parse a tabular dataset.
 *
 * @throws DataUnavailableError when the source cannot be read or parsed,
 *   or has no header row
 * @throws CancellationError when the signal aborts a download
 */
export async function loadDataset(reference: string, options: LoadDatasetOptions = {}): Promise<Dataset> {
  const text = await readSource(reference, options);

  let records: string[][];
  try {
    records = RecordsSchema.parse(
      parse(text, {
        bom: true,
        delimiter: delimiterFor(reference),
        skip_empty_lines: true,
        trim: true,
      })
    );
  } catch (error) {
    throw new DataUnavailableError(
      `Dataset is not valid CSV: ${toError(error).message}`,
      { dataset: reference },
      toError(error)
    );
  }

  const [header, ...body] = records;
  if (!header || header.every((name) => name === '')) {
    throw new DataUnavailableError(`Dataset has no header row: ${reference}`, { dataset: reference });
  }

  const names = uniqueColumnNames(header);
  const rows = body.map((values) =>
    Object.fromEntries(names.map((name, i) => [name, values[i] ?? '']))
  );

  return {
    reference,
    stem: datasetStem(reference),
    columns: names.map((name) => describeColumn(name, rows.map((row) => row[name] ?? ''))),
    rows,
  };
}

async function readSource(reference: string, options: LoadDatasetOptions): Promise<string> {
  if (/^https?:\/\//i.test(reference)) {
    return download(reference, options);
  }

  const path = reference.startsWith('file://') ? fileURLToPath(reference) : reference;
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    const err = toError(error);
    const code = 'code' in err ? String(err.code) : undefined;
    const reason = code === 'ENOENT' ? 'not found' : code === 'EISDIR' ? 'is a directory' : err.message;
    throw new DataUnavailableError(`Dataset ${reason}: ${path}`, { dataset: reference, code }, err);
  }
}

async function download(reference: string, options: LoadDatasetOptions): Promise<string> {
  const { signal } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  try {
    const response = await fetchImpl(reference, { signal });
    if (!response.ok) {
      throw new DataUnavailableError(
        `Could not download dataset: HTTP ${response.status}`,
        { dataset: reference, status: response.status }
      );
    }
    return await response.text();
  } catch (error) {
    if (signal?.aborted) {
      throw new CancellationError('Run cancelled while downloading the dataset', { dataset: reference });
    }
    if (error instanceof DataUnavailableError) throw error;
    const err = toError(error);
    throw new DataUnavailableError(`Could not download dataset: ${err.message}`, { dataset: reference }, err);
  }
}

function delimiterFor(reference: string): string {
  const ext = extname(stripQuery(reference)).toLowerCase();
  return ext === '.tsv' || ext === '.tab' ? '\t' : ',';
}

function stripQuery(reference: string): string {
  return reference.replace(/[?#].*$/, '');
}

/**
 * File name without directory or extension: `data/coffee_sales.csv` → `coffee_sales`.
 */
export function datasetStem(reference: string): string {
  const name = basename(stripQuery(reference).replace(/\\/g, '/'));
  const stem = name.slice(0, name.length - extname(name).length) || name;
  return stem.replace(/[^\w.-]+/g, '_') || 'dataset';
}

/**
 * Header names as row keys: blanks become `column_<n>` and repeats get a
 * suffix (`region`, `region_2`), so no column is lost.
 */
export function uniqueColumnNames(header: readonly string[]): string[] {
  const taken = new Set<string>();
  return header.map((raw, i) => {
    const base = raw === '' ? `column_${i + 1}` : raw;
    let name = base;
    for (let n = 2; taken.has(name); n++) {
      name = `${base}_${n}`;
    }
    taken.add(name);
    return name;
  });
}

// =============================================================================
// COLUMN PROFILING
// =============================================================================

export function inferColumnType(values: readonly string[]): ColumnType {
  const present = values.filter((v) => v !== '');
  if (present.length === 0) return 'string';
  if (present.every((v) => NUMBER_PATTERN.test(v))) return 'number';
  if (present.every((v) => /^(true|false)$/i.test(v))) return 'boolean';
  if (present.every((v) => DATE_PATTERN.test(v) && !Number.isNaN(Date.parse(v)))) return 'date';
  return 'string';
}

function describeColumn(name: string, values: string[]): DatasetColumn {
  const present = values.filter((v) => v !== '');
  return {
    name,
    type: inferColumnType(values),
    distinct: new Set(present).size,
    ...(present[0] !== undefined && { example: present[0] }),
  };
}

// =============================================================================
// PROMPT CONTEXT
// =============================================================================

/**
 * One line per column: `- price: number (e.g. 3.5)`.
 */
export function describeSchema(dataset: Dataset): string {
  const lines = dataset.columns.map((column) => {
    const distinct = column.type === 'string' ? `, ${column.distinct} distinct values` : '';
    const example = column.example !== undefined ? ` (e.g. ${column.example})` : '';
    return `- ${column.name}: ${column.type}${distinct}${example}`;
  });
  const rowLine = dataset.rows.length === 0 ? 'The dataset has no rows.' : `${dataset.rows.length} rows.`;
  return [...lines, rowLine].join('\n');
}

/**
 * The first `count` rows as pretty JSON, numbers and booleans typed.
 */
export function sampleRows(dataset: Dataset, count = 5): string {
  const types = new Map(dataset.columns.map((c) => [c.name, c.type]));
  const sample = dataset.rows.slice(0, Math.max(0, count)).map((row) =>
    Object.fromEntries(
      Object.entries(row).map(([key, value]) => [key, typedValue(value, types.get(key))])
    )
  );
  return JSON.stringify(sample, null, 2);
}

function typedValue(value: string, type: ColumnType | undefined): string | number | boolean | null {
  if (value === '') return null;
  if (type === 'number') return Number(value);
  if (type === 'boolean') return value.toLowerCase() === 'true';
  return value;
}
