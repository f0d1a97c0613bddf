/**
 * Suggests a starting instruction when a request names a dataset but no
 * chart. Favors categorical comparisons and numeric distributions.
 */

import type { Dataset, DatasetColumn } from './dataset.js';

/** String columns with at most this many distinct values count as categorical */
const MAX_CATEGORIES = 15;

function categoricalColumns(dataset: Dataset): DatasetColumn[] {
  return dataset.columns.filter(
    (c) => c.type === 'boolean' || (c.type === 'string' && c.distinct > 0 && c.distinct <= MAX_CATEGORIES)
  );
}

function pickPreferred(columns: DatasetColumn[], preferred: string[]): DatasetColumn | undefined {
  for (const name of preferred) {
    const match = columns.find((c) => c.name.toLowerCase() === name);
    if (match) return match;
  }
  return columns[0];
}

export function suggestInstruction(dataset: Dataset): string {
  if (dataset.rows.length === 0) {
    return 'The dataset has no rows. Draw a simple placeholder chart stating that no records are available.';
  }

  const categories = categoricalColumns(dataset);
  const numbers = dataset.columns.filter((c) => c.type === 'number');
  const dates = dataset.columns.filter((c) => c.type === 'date');
  const parts: string[] = [];

  const primary = pickPreferred(categories, ['category', 'type', 'label']);
  const measure = pickPreferred(numbers, ['revenue', 'sales', 'price', 'value', 'amount']);

  if (dates[0] && measure) {
    parts.push(`A line chart of \`${measure.name}\` over \`${dates[0].name}\`, aggregated to a readable time grain.`);
  }
  if (primary) {
    parts.push(
      measure
        ? `A bar chart of total \`${measure.name}\` per \`${primary.name}\`, sorted from highest to lowest.`
        : `A bar chart of row counts per \`${primary.name}\`, sorted from highest to lowest.`
    );
  }
  if (measure && !primary && !dates[0]) {
    parts.push(`A histogram of \`${measure.name}\` with its median marked.`);
  }
  if (parts.length === 0) {
    parts.push('A bar chart of row counts for the most informative column.');
  }

  const numbered = parts.map((part, i) => `${i + 1}) ${part}`).join('\n');
  return `Create a chart for this dataset that includes:\n${numbered}\nGive it a descriptive title and clearly labelled axes.`;
}
