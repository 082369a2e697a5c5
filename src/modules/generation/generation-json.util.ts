import { MalformedGenerationOutputError } from './generation.errors';

// Upper bound on how much free text the fallback scan will look at.
export const MAX_EXTRACTION_LENGTH = 16 * 1024;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * First balanced `{ ... }` block, honouring string literals so braces inside
 * quoted values do not end the object early.
 */
export function extractFirstObject(text: string): string | null {
  const bounded = text.slice(0, MAX_EXTRACTION_LENGTH);
  const start = bounded.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < bounded.length; i++) {
    const ch = bounded[i];
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
      if (depth === 0) return bounded.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Two-stage decode of model output: strict JSON first, then the first
 * embedded object. Anything else is a MalformedGenerationOutputError.
 */
export function parseGenerationJson(text: string): JsonObject {
  const strict = tryParse(text.trim());
  if (isJsonObject(strict)) return strict;

  const candidate = extractFirstObject(text);
  if (candidate === null) {
    throw new MalformedGenerationOutputError('JSON not found in model output', text);
  }

  const extracted = tryParse(candidate);
  if (!isJsonObject(extracted)) {
    throw new MalformedGenerationOutputError('Model output contains an invalid JSON object', text);
  }
  return extracted;
}
