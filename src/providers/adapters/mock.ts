/**
 * Mock Provider
 *
 * Offline provider answering the chart prompts with deterministic SVGs.
 * Selected with `--generation-model mock` / `--reflection-model mock`;
 * needs no API key, so the whole workflow can be exercised locally.
 */

import type { LLMProvider, Message, ChatOptions, ChatResponse } from '../types.js';
import { ProviderError } from '../types.js';
import { registerProvider } from '../provider.js';

const INSTRUCTION_LINE = /^User instruction:\s*(.+)$/m;
const SVG_BLOCK = /<svg[\s\S]*?<\/svg>/i;

/** The reflection pass is recognised by its system prompt, which users never write */
const CRITIC_ROLE = /\bcritic\b/i;

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly defaultModel = 'mock';

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    if (options?.signal?.aborted) {
      throw new ProviderError('Request cancelled', this.name, 'CANCELLED');
    }

    const system = messages.filter((m) => m.role === 'system').map((m) => m.content).join('\n');
    const prompt = messages.filter((m) => m.role === 'user').map((m) => m.content).join('\n');

    const content = CRITIC_ROLE.test(system) ? this.reflect(prompt) : this.generate(prompt);

    return {
      content,
      stopReason: 'end_turn',
      usage: { inputTokens: Math.ceil(prompt.length / 4), outputTokens: Math.ceil(content.length / 4) },
    };
  }

  private generate(prompt: string): string {
    const title = escapeXml(prompt.match(INSTRUCTION_LINE)?.[1]?.trim() ?? 'Chart');
    const description = JSON.stringify({ description: `Bar chart: ${title}` });
    return `${description}
<svg xmlns="http://www.w3.org/2000/svg" width="640" height="400" viewBox="0 0 640 400">
  <text x="320" y="30" text-anchor="middle" font-size="14">${title}</text>
  <rect x="80" y="200" width="80" height="150" fill="#4e79a7"/>
  <rect x="220" y="140" width="80" height="210" fill="#4e79a7"/>
  <rect x="360" y="100" width="80" height="250" fill="#4e79a7"/>
  <rect x="500" y="170" width="80" height="180" fill="#4e79a7"/>
</svg>`;
  }

  private reflect(prompt: string): string {
    const original = prompt.match(SVG_BLOCK)?.[0] ?? this.generate(prompt).split('\n').slice(1).join('\n');
    const revised = original
      .replace(/font-size="14"/g, 'font-size="18"')
      .replace(
        /<\/svg>\s*$/i,
        '  <line x1="60" y1="350" x2="600" y2="350" stroke="#333"/>\n' +
          '  <text x="320" y="390" text-anchor="middle" font-size="12">Category</text>\n</svg>'
      );
    const critique = JSON.stringify({
      findings: ['Title is too small to read at a glance', 'The x-axis has no baseline or label'],
      accepted: false,
      description: 'Bar chart with a larger title and a labelled baseline',
    });
    return `${critique}\n${revised}`;
  }
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('mock', {
  priority: 0,
  matches: (model) => /^mock(:.*)?$/.test(model),
  create: () => new MockProvider(),
});
