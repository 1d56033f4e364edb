/**
 * Response Parser - turn raw generation output into a ProposedPatch
 *
 * The prompt asks for a JSON object; models also answer with a fenced diff or
 * `FILENAME:` blocks, which are accepted as a fallback.
 */

import { z } from 'zod';
import { ResponseParseError, type ProposedPatch } from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { extractJsonFromOutput } from './json-extract';

const log = createLogger('response-parser');

const FileEntrySchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

/**
 * Accepts snake_case and camelCase keys, and `files` as a map or a list
 */
export const GenerationResponseSchema = z.object({
  analysis: z.string().optional(),
  explanation: z.string().optional(),
  regression_risk: z.string().optional(),
  regressionRisk: z.string().optional(),
  patch: z.string().optional(),
  diff: z.string().optional(),
  files: z.union([z.record(z.string()), z.array(FileEntrySchema)]).optional(),
});

export type GenerationResponse = z.infer<typeof GenerationResponseSchema>;

export type ParseFailureReason = 'empty_response' | 'no_json' | 'invalid_shape' | 'empty_patch';

export interface ParseFailure {
  ok: false;
  reason: ParseFailureReason;
  message: string;
}

export type ParseResult = { ok: true; patch: ProposedPatch; format: 'json' | 'markdown' } | ParseFailure;

const DIFF_FENCE = /```(?:diff|patch|udiff)[ \t]*\r?\n([\s\S]*?)```/;
const FILENAME_BLOCK =
  /(?:^|\n)[ \t]*(?:#{1,3}[ \t]*FILENAME:|\*\*FILENAME:\*\*|File:|Filename:)[ \t]*`?([^\n`]+?)`?[ \t]*\r?\n```[\w+.-]*[ \t]*\r?\n([\s\S]*?)\r?\n```/gi;

function failure(reason: ParseFailureReason, message: string): ParseFailure {
  return { ok: false, reason, message };
}

function toFileMap(files: GenerationResponse['files']): Record<string, string> {
  if (!files) return {};
  if (Array.isArray(files)) {
    return Object.fromEntries(files.map(file => [file.path, file.content]));
  }
  return { ...files };
}

function normalizeRisk(risk: string | undefined): string {
  const value = (risk ?? '').trim().toLowerCase();
  return value || 'unknown';
}

function isEmpty(patch: ProposedPatch): boolean {
  return !patch.diff.trim() && Object.keys(patch.files).length === 0;
}

/**
 * Fallback for answers that ignored the JSON contract
 */
export function parseMarkdownResponse(raw: string): ProposedPatch | null {
  const diff = DIFF_FENCE.exec(raw)?.[1] ?? '';
  const files: Record<string, string> = {};
  for (const match of raw.matchAll(FILENAME_BLOCK)) {
    const filePath = (match[1] ?? '').trim();
    if (filePath) files[filePath] = match[2] ?? '';
  }

  const patch: ProposedPatch = {
    diff: diff.trim() ? diff : '',
    files,
    analysis: '',
    explanation: raw.slice(0, 500).trim(),
    regressionRisk: 'unknown',
  };
  return isEmpty(patch) ? null : patch;
}

function parseJsonResponse(raw: string): ParseResult {
  let payload: unknown;
  try {
    payload = extractJsonFromOutput(raw);
  } catch (error) {
    if (error instanceof ResponseParseError) {
      return failure('no_json', error.message);
    }
    throw error;
  }

  const parsed = GenerationResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return failure('invalid_shape', `Response does not match the contract: ${issues.join('; ')}`);
  }

  const data = parsed.data;
  const patch: ProposedPatch = {
    diff: data.patch ?? data.diff ?? '',
    files: toFileMap(data.files),
    analysis: data.analysis ?? '',
    explanation: data.explanation ?? '',
    regressionRisk: normalizeRisk(data.regression_risk ?? data.regressionRisk),
  };

  if (isEmpty(patch)) {
    return failure('empty_patch', 'Response contains neither a patch nor file contents');
  }
  return { ok: true, patch, format: 'json' };
}

/**
 * Parse raw model output. Never throws; failures carry a reason for the attempt log.
 */
export function parseGenerationResponse(raw: string): ParseResult {
  if (!raw.trim()) {
    return failure('empty_response', 'Model returned an empty response');
  }

  const result = parseJsonResponse(raw);
  if (result.ok) return result;

  const fallback = parseMarkdownResponse(raw);
  if (fallback) {
    log.debug('Using markdown fallback for generation response', { jsonFailure: result.reason });
    return { ok: true, patch: fallback, format: 'markdown' };
  }
  return result;
}
