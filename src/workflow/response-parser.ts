/**
 * Reads model answers of the form "JSON header line, then an SVG document".
 */

import { z } from 'zod';

export const DEFAULT_DESCRIPTION = 'Chart visualization';

const SVG_BLOCK = /<svg\b[\s\S]*<\/svg>/i;

const GenerationHeaderSchema = z.object({
  description: z.string().optional(),
});

const CritiqueHeaderSchema = z.object({
  findings: z.array(z.string()),
  accepted: z.boolean(),
  description: z.string().optional(),
});

export type CritiqueHeader = z.infer<typeof CritiqueHeaderSchema>;

/**
 * Extract the SVG document (first `<svg` to last `</svg>`), or null.
 */
export function extractSvg(content: string): string | null {
  const match = content.match(SVG_BLOCK);
  if (!match) return null;
  const svg = match[0].trim();
  // An element with no children draws nothing
  return /^<svg\b[^>]*>\s*<\/svg>$/i.test(svg) ? null : svg;
}

/**
 * Parse the header JSON: the first line if it is an object, otherwise the
 * first balanced `{...}` before the SVG that parses.
 */
function parseHeader(content: string): unknown {
  const beforeSvg = content.split(/<svg\b/i)[0] ?? '';
  const firstLine = beforeSvg.trim().split('\n')[0]?.trim() ?? '';

  const first = tryParseJson(firstLine);
  if (first.ok) return first.value;

  for (let from = beforeSvg.indexOf('{'); from !== -1; from = beforeSvg.indexOf('{', from + 1)) {
    const candidate = extractJsonObject(beforeSvg, from);
    if (candidate === null) continue;
    const parsed = tryParseJson(candidate);
    if (parsed.ok) return parsed.value;
  }
  return null;
}

/**
 * The object opening at `start`, matched by brace depth. Braces inside
 * strings and escaped quotes do not count. Null when it never closes.
 */
export function extractJsonObject(text: string, start = text.indexOf('{')): string | null {
  if (start < 0 || text[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === '\\' && inString) {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{' || char === '[') depth++;
    if (char === '}' || char === ']') depth--;
    if (depth === 0) return text.slice(start, i + 1);
  }
  return null;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * The generation header is advisory: a bad or missing one yields the default description.
 */
export function parseGenerationHeader(content: string): { description: string } {
  const parsed = GenerationHeaderSchema.safeParse(parseHeader(content));
  const description = parsed.success ? parsed.data.description?.trim() : undefined;
  return { description: description || DEFAULT_DESCRIPTION };
}

/**
 * The critique header is required; returns null when it is missing or malformed.
 */
export function parseCritiqueHeader(content: string): CritiqueHeader | null {
  const parsed = CritiqueHeaderSchema.safeParse(parseHeader(content));
  if (!parsed.success) return null;
  return {
    findings: parsed.data.findings.map((f) => f.trim()).filter((f) => f !== ''),
    accepted: parsed.data.accepted,
    description: parsed.data.description?.trim() || DEFAULT_DESCRIPTION,
  };
}
