import type { z } from 'zod';

/**
 * Strip markdown code fences from LLM output.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Slice out the first balanced `{...}` in the text, ignoring braces inside
 * JSON strings. Returns null when there is none.
 */
export function findFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Parse a JSON object out of a model reply: fenced, bare, or embedded in
 * prose. Returns null when nothing parseable matches the schema.
 */
export function parseJsonReply<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | null {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) return null;

  let value = tryJson(cleaned);
  if (value === undefined) {
    const candidate = findFirstJsonObject(cleaned);
    if (candidate === null) return null;
    value = tryJson(candidate);
    if (value === undefined) return null;
  }

  const result = schema.safeParse(value);
  return result.success ? result.data : null;
}
