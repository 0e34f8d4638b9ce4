/**
 * Response Parser - extracts the action block from a model reply
 *
 * Models are told to answer with a bare JSON object but routinely wrap it in
 * prose or a markdown fence. Strategies run in order of preference; the last
 * one never fails, so every reply yields a non-empty `text`.
 */
import type { ActionBlock, ParsedResponse } from '../types/chat.js';

export const EMPTY_REPLY_TEXT = '(The model returned an empty response)';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an already-decoded value against the action block shape.
 * Returns undefined when `text` is missing or blank.
 */
export function toActionBlock(value: unknown): ActionBlock | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const record = value;

  if (typeof record.text !== 'string' || record.text.trim() === '') {
    return undefined;
  }

  const commands = Array.isArray(record.gdbCommands)
    ? record.gdbCommands.filter((c): c is string => typeof c === 'string')
    : [];

  return {
    text: record.text,
    commands,
    waitForOutput: record.waitForOutput === true,
  };
}

function tryParseBlock(candidate: string): ActionBlock | undefined {
  try {
    return toActionBlock(JSON.parse(candidate));
  } catch {
    return undefined;
  }
}

/**
 * Remove a leading ```json (or bare ```) fence and a trailing ``` fence.
 */
export function stripJsonFence(raw: string): string {
  let cleaned = raw.trim();
  const opening = cleaned.match(/^```(?:json)?/i);
  if (opening) {
    cleaned = cleaned.slice(opening[0].length);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Find the end index of the object opening at `start`, counting braces
 * outside of string literals. Returns -1 when the braces never balance.
 */
function findMatchingBrace(raw: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Return the first balanced `{...}` slice of `raw` that is valid JSON.
 */
export function extractJsonObject(raw: string): string | undefined {
  let start = raw.indexOf('{');

  while (start !== -1) {
    const end = findMatchingBrace(raw, start);
    if (end === -1) return undefined;

    const slice = raw.slice(start, end + 1);
    try {
      JSON.parse(slice);
      return slice;
    } catch {
      start = raw.indexOf('{', start + 1);
    }
  }

  return undefined;
}

export function parseResponse(raw: string): ParsedResponse {
  const full = tryParseBlock(raw);
  if (full) {
    return { ...full, method: 'full_json', raw };
  }

  const fenced = tryParseBlock(stripJsonFence(raw));
  if (fenced) {
    return { ...fenced, method: 'fenced_json', raw };
  }

  const slice = extractJsonObject(raw);
  if (slice !== undefined) {
    const extracted = tryParseBlock(slice);
    if (extracted) {
      return { ...extracted, method: 'extracted_json', raw };
    }
  }

  return {
    text: raw.trim() === '' ? EMPTY_REPLY_TEXT : raw,
    commands: [],
    waitForOutput: false,
    method: 'fallback',
    raw,
  };
}

export function isStructured(parsed: ParsedResponse): boolean {
  return parsed.method !== 'fallback';
}
