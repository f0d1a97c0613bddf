import { describe, it, expect } from 'vitest';
import { suggestInstruction } from '../../src/data/instruction.js';
import { loadDataset, type Dataset, type DatasetColumn } from '../../src/data/dataset.js';
import { COFFEE_SALES } from '../helpers/scripted-models.js';

function table(columns: DatasetColumn[], rowCount = 3): Dataset {
  return {
    reference: 't.csv',
    stem: 't',
    columns,
    rows: Array.from({ length: rowCount }, () => ({})),
  };
}

describe('suggestInstruction', () => {
  it('should ask for a trend and a breakdown on the coffee sales data', async () => {
    const dataset = await loadDataset(COFFEE_SALES);

    expect(suggestInstruction(dataset)).toBe(
      'Create a chart for this dataset that includes:\n' +
        '1) A line chart of `revenue` over `date`, aggregated to a readable time grain.\n' +
        '2) A bar chart of total `revenue` per `quarter`, sorted from highest to lowest.\n' +
        'Give it a descriptive title and clearly labelled axes.'
    );
  });

  it('should prefer well-known category and measure names', () => {
    const text = suggestInstruction(
      table([
        { name: 'region', type: 'string', distinct: 5 },
        { name: 'Category', type: 'string', distinct: 3 },
        { name: 'units', type: 'number', distinct: 3 },
        { name: 'price', type: 'number', distinct: 3 },
      ])
    );

    expect(text).toContain('1) A bar chart of total `price` per `Category`, sorted from highest to lowest.');
  });

  it('should count rows when there is no measure', () => {
    const text = suggestInstruction(table([{ name: 'active', type: 'boolean', distinct: 2 }]));

    expect(text).toContain('1) A bar chart of row counts per `active`, sorted from highest to lowest.');
  });

  it('should skip high-cardinality text columns', () => {
    const text = suggestInstruction(
      table([
        { name: 'customer', type: 'string', distinct: 400 },
        { name: 'amount', type: 'number', distinct: 3 },
      ])
    );

    expect(text).toContain('1) A histogram of `amount` with its median marked.');
    expect(text).not.toContain('customer');
  });

  it('should fall back to a generic chart', () => {
    const text = suggestInstruction(table([{ name: 'note', type: 'string', distinct: 100 }]));

    expect(text).toContain('1) A bar chart of row counts for the most informative column.');
  });

  it('should handle an empty table', () => {
    expect(suggestInstruction(table([{ name: 'a', type: 'string', distinct: 0 }], 0))).toBe(
      'The dataset has no rows. Draw a simple placeholder chart stating that no records are available.'
    );
  });
});
