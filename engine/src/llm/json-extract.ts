/**
 * JSON extraction from model output
 */

import { jsonrepair } from 'jsonrepair';
import { ResponseParseError } from '@repairgate/shared-types';

/**
 * Extract a JSON payload from model output: the whole text, then fenced
 * blocks, then balanced brace candidates (longest first), then the span from
 * the first `{` to the last `}`. Throws ResponseParseError when none parse.
 */
export function extractJsonFromOutput(raw: string): unknown {
  const direct = tryParseJson(raw, { allowRepair: false });
  if (direct !== null) {
    return direct;
  }

  const codeBlockMatches = [...raw.matchAll(/```(?:json)?\s*([\s\S]*?)```/g)];
  for (const match of codeBlockMatches) {
    const parsed = tryParseJson(match[1] ?? '', { allowRepair: true });
    if (parsed !== null) {
      return parsed;
    }
  }

  const candidates = extractBalancedJsonCandidates(raw).sort((a, b) => b.length - a.length);
  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate, { allowRepair: true });
    if (parsed !== null) {
      return parsed;
    }
  }

  const firstBrace = raw.indexOf('{');
  const lastBrace = raw.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace !== -1 && lastBrace > firstBrace) {
    const parsed = tryParseJson(raw.slice(firstBrace, lastBrace + 1), { allowRepair: true });
    if (parsed !== null) {
      return parsed;
    }
  }

  throw new ResponseParseError('No JSON object found in model output');
}

function parseOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function tryParseJson(input: string, options: { allowRepair?: boolean } = {}): unknown {
  const trimmed = stripControlChars(input).replace(/^\uFEFF/, '').trim();
  if (!trimmed || !/^[[{]/.test(trimmed)) {
    return null;
  }

  const direct = parseOrNull(trimmed);
  if (direct !== null) return direct;

  const normalized = trimmed
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/,\s*([}\]])/g, '$1');

  const cleaned = parseOrNull(normalized);
  if (cleaned !== null) return cleaned;

  if (options.allowRepair) {
    try {
      return parseOrNull(jsonrepair(normalized));
    } catch {
      return null;
    }
  }

  return null;
}

function stripControlChars(input: string): string {
  // keep \t, \n and \r: diffs inside JSON strings may carry them unescaped
  return input.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
}

function extractBalancedJsonCandidates(raw: string): string[] {
  const candidates: string[] = [];
  let start = -1;
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];

    if (start === -1) {
      if (ch === '{') {
        start = i;
        stack.length = 0;
        stack.push(ch);
        inString = false;
        escaped = false;
      }
      continue;
    }

    if (inString) {
      if (escaped) {
        escaped = false;
        continue;
      }
      if (ch === '\\') {
        escaped = true;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '{' || ch === '[') {
      stack.push(ch);
      continue;
    }

    if (ch === '}' || ch === ']') {
      const open = stack.pop();
      const matched = (open === '{' && ch === '}') || (open === '[' && ch === ']');

      if (!matched) {
        start = -1;
        stack.length = 0;
        inString = false;
        escaped = false;
        continue;
      }

      if (stack.length === 0 && start !== -1) {
        candidates.push(raw.slice(start, i + 1));
        start = -1;
      }
    }
  }

  return candidates;
}
