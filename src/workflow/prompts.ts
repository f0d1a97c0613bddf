/**
 * Prompt templates for the two model passes.
 *
 * Both passes answer in the same shape: line 1 is a JSON object, the rest
 * is a standalone SVG document. `response-parser.ts` reads that shape back.
 */

import type { ContentPrompt } from '../providers/content-model.js';

export interface PromptContext {
  schema: string;
  sampleRowsJson: string;
}

const SVG_RULES = `
Chart rules:
1. Output a single standalone <svg> element with xmlns="http://www.w3.org/2000/svg", a width, a height and a viewBox.
2. Compute every mark from the data shown above; do not invent values.
3. Give the chart a title and label both axes (with units where known).
4. Use colors that remain distinguishable for color-blind readers.
5. No scripts, external images, fonts or stylesheets.
`.trim();

export const CHART_PROMPTS = {
  /**
   * First pass: draw the chart.
   */
  generation: (instruction: string, context: PromptContext): ContentPrompt => ({
    system: 'You are a data visualization expert who draws charts directly as SVG markup.',
    prompt: `
Dataset schema:
${context.schema}

Sample rows (JSON):
${context.sampleRowsJson}

${SVG_RULES}

Answer strictly in this format:
1) First line: a JSON object with a "description" field summarising the chart.
   Example: {"description": "Horizontal bar chart of total sales by coffee type, highest first."}
2) Then the SVG document and nothing else.

User instruction: ${instruction}
`.trim(),
  }),

  /**
   * Second pass: judge the first chart and redraw it.
   */
  reflection: (
    instruction: string,
    context: PromptContext,
    draft: { description: string; svg: string }
  ): ContentPrompt => ({
    system:
      'You are an expert data visualization critic. You judge charts against the request that produced them ' +
      'and then redraw them as SVG.',
    prompt: `
Dataset schema:
${context.schema}

Sample rows (JSON):
${context.sampleRowsJson}

Original instruction:
${instruction}

The first draft was described as: ${draft.description}

First draft SVG:
${draft.svg}

Judge the draft against the instruction:
- Does the chart type fit the data and the request?
- Are scales honest (bars start at zero, no distorted aspect ratio)?
- Are the title, axis labels and legend legible and necessary?
- Is there clutter that carries no information?

${SVG_RULES}

Answer strictly in this format:
1) First line: a JSON object with
   "findings": an array of concrete deficiencies (empty if there are none),
   "accepted": true if the draft already satisfies the instruction, otherwise false,
   "description": a one-sentence summary of the revised chart.
   Example: {"findings": ["Axis labels overlap"], "accepted": false, "description": "Bar chart with rotated labels."}
2) Then the revised SVG document and nothing else. It must differ from the draft.
`.trim(),
  }),
};
