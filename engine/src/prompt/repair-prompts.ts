/**
 * Repair Prompts - templates for the generation model
 *
 * Attempt 0 gets a full analysis prompt (error, source excerpts, test).
 * Later attempts get an alternative-approach prompt that also carries the
 * previous patch and its failure output, and asks for a different strategy.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ErrorReport, ProposedPatch } from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { resolvePathWithinBase } from '../security/path-safety';

const log = createLogger('prompt');

export const MAX_FILE_CHARS = 12_000;
export const MAX_TOTAL_CHARS = 48_000;
export const MAX_ERROR_CHARS = 6_000;
export const MAX_FAILURE_CHARS = 4_000;

export interface PromptFile {
  path: string;
  content: string;
}

export interface PromptContext {
  errorReport: ErrorReport;
  /** Source excerpts, most relevant first */
  files: PromptFile[];
  testFile?: PromptFile;
  language: string;
}

export interface PreviousAttempt {
  index: number;
  patch: ProposedPatch | null;
  /** Validation output or the reason the attempt failed */
  failure: string;
}

const CODE_FENCE_LANGUAGE: Record<string, string> = {
  '.py': 'python',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.rb': 'ruby',
  '.json': 'json',
  '.toml': 'toml',
  '.md': 'markdown',
};

function fenceLanguage(filePath: string): string {
  return CODE_FENCE_LANGUAGE[path.extname(filePath).toLowerCase()] || 'text';
}

/**
 * Keep the head of `text`, noting how much was cut
 */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}\n... [truncated ${text.length - limit} characters]`;
}

function formatFiles(files: PromptFile[]): string {
  let prompt = '';
  let budget = MAX_TOTAL_CHARS;
  let omitted = 0;

  for (const file of files) {
    if (budget <= 0) {
      omitted += 1;
      continue;
    }
    const excerpt = truncate(file.content, Math.min(MAX_FILE_CHARS, budget));
    budget -= Math.min(file.content.length, MAX_FILE_CHARS);
    prompt += `### ${file.path}\n`;
    prompt += `\`\`\`${fenceLanguage(file.path)}\n${excerpt}\n\`\`\`\n\n`;
  }

  if (omitted > 0) {
    prompt += `*... ${omitted} more file${omitted !== 1 ? 's' : ''} omitted*\n\n`;
  }
  return prompt;
}

function formatError(report: ErrorReport): string {
  let prompt = `## Error\n`;
  prompt += `- **Category**: ${report.category}\n`;
  if (report.referencedPaths.length > 0) {
    prompt += `- **Referenced files**: ${report.referencedPaths.join(', ')}\n`;
  }
  if (report.symbols.length > 0) {
    prompt += `- **Symbols**: ${report.symbols.join(', ')}\n`;
  }
  prompt += `\n\`\`\`text\n${truncate(report.raw.trim(), MAX_ERROR_CHARS)}\n\`\`\`\n\n`;
  return prompt;
}

function formatTest(testFile: PromptFile | undefined): string {
  if (!testFile) return '';
  let prompt = `## Failing Test\n`;
  prompt += `### ${testFile.path}\n`;
  prompt += `\`\`\`${fenceLanguage(testFile.path)}\n${truncate(testFile.content, MAX_FILE_CHARS)}\n\`\`\`\n\n`;
  return prompt;
}

/**
 * The JSON object the response parser expects
 */
export function responseContract(): string {
  let prompt = `## Response Format\n`;
  prompt += `Respond with a single JSON object and nothing else:\n`;
  prompt += '```json\n';
  prompt += '{\n';
  prompt += '  "analysis": "root cause of the failure",\n';
  prompt += '  "explanation": "what the change does",\n';
  prompt += '  "regression_risk": "low | medium | high",\n';
  prompt += '  "patch": "unified diff against the files above (--- a/path, +++ b/path)",\n';
  prompt += '  "files": { "relative/path": "full replacement content, only when a diff is impractical" }\n';
  prompt += '}\n';
  prompt += '```\n';
  prompt += `Paths are relative to the project root. Leave "files" empty when "patch" covers the change.\n`;
  return prompt;
}

export function buildFullAnalysisPrompt(context: PromptContext): string {
  let prompt = `# Repair Task\n\n`;
  prompt += `A ${context.language} project fails with the error below. Find the root cause and propose the smallest change that makes the failing test pass.\n\n`;
  prompt += formatError(context.errorReport);
  prompt += formatTest(context.testFile);

  prompt += `## Source Files (${context.files.length})\n\n`;
  prompt += formatFiles(context.files);

  prompt += `## Repair Guidelines\n`;
  prompt += `1. **Analyze the trace** before changing code\n`;
  prompt += `2. **Fix the root cause**, not the symptom\n`;
  prompt += `3. **Minimal changes**: do not refactor unrelated code\n`;
  prompt += `4. **Do not edit tests** unless the test itself is wrong\n\n`;

  prompt += responseContract();
  return prompt;
}

export function buildAlternativeApproachPrompt(context: PromptContext, previous: PreviousAttempt): string {
  let prompt = `# Repair Task (Attempt ${previous.index + 2})\n\n`;
  prompt += `A previous fix for this ${context.language} project did not work. Use a **different approach** from the one below.\n\n`;
  prompt += formatError(context.errorReport);

  prompt += `## Previous Attempt\n`;
  if (previous.patch) {
    if (previous.patch.analysis) {
      prompt += `- **Analysis**: ${previous.patch.analysis}\n`;
    }
    if (previous.patch.diff.trim()) {
      prompt += `\n\`\`\`diff\n${truncate(previous.patch.diff.trim(), MAX_FILE_CHARS)}\n\`\`\`\n`;
    }
    const replaced = Object.keys(previous.patch.files);
    if (replaced.length > 0) {
      prompt += `- **Replaced files**: ${replaced.join(', ')}\n`;
    }
  } else {
    prompt += `No usable patch was produced.\n`;
  }
  prompt += `\n### Why It Failed\n`;
  prompt += `\`\`\`text\n${truncate(previous.failure.trim(), MAX_FAILURE_CHARS)}\n\`\`\`\n\n`;

  prompt += formatTest(context.testFile);
  prompt += `## Source Files (${context.files.length})\n\n`;
  prompt += formatFiles(context.files);

  prompt += `## Repair Guidelines\n`;
  prompt += `1. **Do not repeat** the previous change\n`;
  prompt += `2. **Reconsider the root cause** using the failure output\n`;
  prompt += `3. **Minimal changes**: do not refactor unrelated code\n\n`;

  prompt += responseContract();
  return prompt;
}

/**
 * Read prompt excerpts from the MRE. Unreadable files are skipped.
 */
export async function collectPromptFiles(root: string, relativePaths: string[]): Promise<PromptFile[]> {
  const files: PromptFile[] = [];
  for (const relativePath of relativePaths) {
    try {
      const content = await fs.readFile(resolvePathWithinBase(root, relativePath), 'utf-8');
      files.push({ path: relativePath, content });
    } catch (error) {
      log.warn('Skipping unreadable prompt file', { path: relativePath, error: String(error) });
    }
  }
  return files;
}
