/**
 * Technical debt heuristics over loaded source files.
 *
 * Three signals, each scored 0-100:
 * - branching density: conditional/loop/exception keywords per non-blank line
 * - duplication: share of repeated windows of normalized lines
 * - documentation absence: public symbols without a docstring or leading comment
 */

import type { SourceFile, SourceLanguage } from './source-scanner';

export const DEBT_WEIGHTS = {
  branching: 0.4,
  duplication: 0.3,
  documentation: 0.3,
} as const;

/** Branches per non-blank line that scores the full 100 */
const BRANCH_DENSITY_CEILING = 0.25;
const DUPLICATE_WINDOW_LINES = 6;
const DUPLICATE_WINDOW_MIN_CHARS = 40;

const BRANCH_KEYWORDS = /\b(if|elif|for|foreach|while|case|catch|except|switch)\b/g;
const COMMENT_LINE = /^(#|\/\/|\/\*|\*|--)/;

export interface DebtBreakdown {
  branchScore: number;
  duplicationScore: number;
  documentationScore: number;
  technicalDebt: number;
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, value));
}

function nonBlankLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
}

export function branchingScore(files: SourceFile[]): number {
  let branches = 0;
  let lines = 0;

  for (const file of files) {
    for (const line of nonBlankLines(file.content)) {
      lines += 1;
      if (COMMENT_LINE.test(line)) continue;
      branches += line.match(BRANCH_KEYWORDS)?.length ?? 0;
    }
  }

  if (lines === 0) return 0;
  return clamp((branches / lines / BRANCH_DENSITY_CEILING) * 100, 0, 100);
}

export function duplicationScore(files: SourceFile[]): number {
  const seen = new Set<string>();
  let windows = 0;
  let duplicates = 0;

  for (const file of files) {
    const lines = nonBlankLines(file.content).map(line => line.replace(/\s+/g, ' '));
    for (let start = 0; start + DUPLICATE_WINDOW_LINES <= lines.length; start++) {
      const key = lines.slice(start, start + DUPLICATE_WINDOW_LINES).join('\n');
      if (key.length < DUPLICATE_WINDOW_MIN_CHARS) continue;
      windows += 1;
      if (seen.has(key)) {
        duplicates += 1;
      } else {
        seen.add(key);
      }
    }
  }

  if (windows === 0) return 0;
  return clamp((duplicates / windows) * 100, 0, 100);
}

interface PublicSymbolRule {
  declaration: RegExp;
  /** Docstring on the lines following the declaration (python) */
  trailingDoc?: boolean;
}

const PUBLIC_SYMBOL_RULES: Record<SourceLanguage, PublicSymbolRule> = {
  python: { declaration: /^\s*(async\s+)?(def|class)\s+[A-Za-z]\w*/, trailingDoc: true },
  javascript: {
    declaration: /^\s*export\s+(default\s+)?(async\s+)?(function|class|const|let|var)\b/,
  },
  typescript: {
    declaration:
      /^\s*export\s+(default\s+)?(abstract\s+)?(async\s+)?(function|class|const|let|interface|type|enum)\b/,
  },
  go: { declaration: /^(func\s+(\([^)]*\)\s*)?|type\s+)[A-Z]\w*/ },
  ruby: { declaration: /^\s*(def|class|module)\s+[A-Za-z]\w*/ },
  rust: { declaration: /^\s*pub\s+(async\s+)?(fn|struct|enum|trait)\b/ },
  java: { declaration: /^\s*public\s+.*(class|interface|enum|\()/ },
  php: { declaration: /^\s*(public\s+)?(static\s+)?function\s+[A-Za-z]\w*|^\s*class\s+\w+/ },
  csharp: { declaration: /^\s*public\s+.*(class|interface|struct|enum|\()/ },
  kotlin: { declaration: /^\s*(fun|class|object|interface)\s+[A-Za-z]\w*/ },
};

function hasLeadingComment(lines: string[], index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line) continue;
    if (line.startsWith('@')) continue; // decorators / annotations
    return COMMENT_LINE.test(line) || line.endsWith('*/') || line.startsWith('///');
  }
  return false;
}

function hasTrailingDocstring(lines: string[], index: number): boolean {
  // skip the rest of a multi-line signature
  let bodyStart = index;
  while (bodyStart < lines.length && !lines[bodyStart].trimEnd().endsWith(':')) {
    bodyStart += 1;
    if (bodyStart - index > 8) return false;
  }
  for (let i = bodyStart + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    return /^[rRbBuU]?("""|''')/.test(line);
  }
  return false;
}

export function documentationScore(files: SourceFile[]): number {
  let publicSymbols = 0;
  let undocumented = 0;

  for (const file of files) {
    const rule = PUBLIC_SYMBOL_RULES[file.language];
    const lines = file.content.split(/\r?\n/);

    lines.forEach((line, index) => {
      if (!rule.declaration.test(line)) return;
      if (file.language === 'python' && /(def|class)\s+_/.test(line)) return;

      publicSymbols += 1;
      const documented =
        hasLeadingComment(lines, index) || (rule.trailingDoc === true && hasTrailingDocstring(lines, index));
      if (!documented) {
        undocumented += 1;
      }
    });
  }

  if (publicSymbols === 0) return 0;
  return clamp((undocumented / publicSymbols) * 100, 0, 100);
}

export function analyzeTechnicalDebt(files: SourceFile[]): DebtBreakdown {
  const branchScore = branchingScore(files);
  const dupScore = duplicationScore(files);
  const docScore = documentationScore(files);

  return {
    branchScore,
    duplicationScore: dupScore,
    documentationScore: docScore,
    technicalDebt: clamp(
      DEBT_WEIGHTS.branching * branchScore +
        DEBT_WEIGHTS.duplication * dupScore +
        DEBT_WEIGHTS.documentation * docScore,
      0,
      100
    ),
  };
}
