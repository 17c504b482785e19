/**
 * Structured-output validation: checks, extracts and repairs JSON that
 * models wrap in prose or markdown fences.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('json-validator');

const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\n?([\s\S]*?)```/g;

const LANGUAGE_TAG_LINE = /^[a-zA-Z]*[ \t]*\n/;

const CLOSER: Record<string, string> = { '{': '}', '[': ']' };

export interface JsonValidation {
  valid: boolean;
  json: string | null;
}

export function isValidJson(text: string): boolean {
  if (text.trim().length === 0) {
    return false;
  }
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * From the first `{` or `[`, return the shortest balanced span, skipping
 * bracket characters inside string literals.
 */
function scanBalanced(text: string): string | null {
  const start = text.search(/[{[]/);
  if (start === -1) {
    return null;
  }

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      stack.push(CLOSER[char]);
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) {
        return null;
      }
      if (stack.length === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Body of a reply that is one fenced block from end to end. Fences inside
 * string values would cut the lazy per-block match short.
 */
function outerFenceBody(trimmed: string): string | null {
  if (trimmed.length <= 6 || !trimmed.startsWith('```') || !trimmed.endsWith('```')) {
    return null;
  }
  return trimmed.slice(3, -3).replace(LANGUAGE_TAG_LINE, '').trim();
}

/**
 * Find JSON in model output. Tries, in order: the whole text, the span
 * between its outermost fences, each fenced code block, then a balanced
 * scan from the first opening bracket.
 */
export function extractJson(text: string): string | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (isValidJson(trimmed)) {
    return trimmed;
  }

  const outer = outerFenceBody(trimmed);
  if (outer !== null && isValidJson(outer)) {
    return outer;
  }

  for (const match of trimmed.matchAll(FENCED_BLOCK)) {
    const candidate = match[1].trim();
    if (isValidJson(candidate)) {
      return candidate;
    }
  }

  const scanned = scanBalanced(trimmed);
  if (scanned !== null && isValidJson(scanned)) {
    return scanned;
  }

  log.debug({ preview: trimmed.slice(0, 200) }, 'No valid JSON found in text');
  return null;
}

/**
 * Close brackets left open at the end of the text. Returns null when the
 * text has stray closers or is still invalid after closing.
 */
export function attemptRepair(text: string): string | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of trimmed) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      stack.push(CLOSER[char]);
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) {
        return null;
      }
    }
  }

  if (inString || stack.length === 0) {
    return null;
  }

  const repaired = trimmed + stack.reverse().join('');
  if (isValidJson(repaired)) {
    log.debug({ added: stack.length }, 'Repaired JSON by closing brackets');
    return repaired;
  }
  return null;
}

/**
 * Extract, falling back to repair of the text from its first bracket.
 */
export function validateAndExtract(text: string): JsonValidation {
  const extracted = extractJson(text);
  if (extracted !== null) {
    return { valid: true, json: extracted };
  }

  const start = text.search(/[{[]/);
  const repaired = start === -1 ? null : attemptRepair(text.slice(start));
  if (repaired !== null) {
    return { valid: true, json: repaired };
  }

  return { valid: false, json: null };
}
