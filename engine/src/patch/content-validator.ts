/**
 * Content Validator - shallow checks on full-file content from a generation model
 *
 * `validateFileContent` returns a short description of the problem, or null
 * when the content is acceptable for its file type:
 * - JSON must parse
 * - requirements files must list one requirement per line
 * - Dockerfiles need a FROM instruction
 * - Python and JavaScript/TypeScript sources need balanced brackets outside
 *   strings and comments
 * Anything else only has to be non-empty.
 */

import path from 'path';
import { errorMessage } from '@repairgate/shared-types';

export type ScriptDialect = 'python' | 'javascript';

/** Files that are legitimately empty */
const EMPTY_ALLOWED = new Set(['__init__.py', 'py.typed', '.gitkeep', '.keep']);

// JSX text is free-form, so .jsx and .tsx are not scanned
const SCRIPT_DIALECTS = new Map<string, ScriptDialect>([
  ['.py', 'python'],
  ['.js', 'javascript'],
  ['.mjs', 'javascript'],
  ['.cjs', 'javascript'],
  ['.ts', 'javascript'],
  ['.mts', 'javascript'],
  ['.cts', 'javascript'],
]);

const REQUIREMENT_NAME = String.raw`[A-Za-z0-9][A-Za-z0-9._-]*(\[[A-Za-z0-9._,\s-]*\])?`;
const VERSION_CLAUSE = String.raw`(===|==|!=|~=|<=|>=|<|>)\s*[^\s,;]+`;
const REQUIREMENT_LINE = new RegExp(
  String.raw`^${REQUIREMENT_NAME}\s*(${VERSION_CLAUSE}(\s*,\s*${VERSION_CLAUSE})*)?\s*(;.*)?$`
);
const URL_REQUIREMENT_LINE = new RegExp(String.raw`^${REQUIREMENT_NAME}\s*@\s*\S+`);

const DOCKER_FROM = /^\s*FROM\s+\S+/im;

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Map([
  [')', '('],
  [']', '['],
  ['}', '{'],
]);

/** A `/` after one of these (or at the start) begins a regex literal */
const REGEX_PRECEDERS = new Set([...'(,=:[!&|?{};+-*%<>~^', '']);
const REGEX_KEYWORDS = new Set([
  'return',
  'typeof',
  'case',
  'do',
  'else',
  'in',
  'of',
  'void',
  'yield',
  'await',
  'throw',
  'delete',
  'instanceof',
  'new',
]);

const IDENTIFIER = /[A-Za-z_$][\w$]*/y;

interface OpenBracket {
  char: string;
  line: number;
  /** `${` of a template literal */
  template: boolean;
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count += 1;
  }
  return count;
}

function isRequirementsFile(baseName: string): boolean {
  return /^requirements([._-][\w.-]*)?\.txt$/i.test(baseName);
}

function isDockerfile(baseName: string): boolean {
  const lower = baseName.toLowerCase();
  return lower === 'dockerfile' || lower.startsWith('dockerfile.') || lower.endsWith('.dockerfile');
}

function checkRequirements(content: string): string | null {
  for (const [index, raw] of content.split('\n').entries()) {
    const line = raw.replace(/\s+#.*$/, '').trim();
    if (!line || line.startsWith('#') || line.startsWith('-') || line.includes('://')) continue;
    if (!REQUIREMENT_LINE.test(line) && !URL_REQUIREMENT_LINE.test(line)) {
      return `line ${index + 1} is not a requirement: ${line}`;
    }
  }
  return null;
}

/**
 * End of a quoted string starting at `start`, or -1 when it is unterminated
 */
function stringEnd(content: string, start: number, dialect: ScriptDialect): number {
  const quote = content.charAt(start);
  const triple = quote.repeat(3);
  if (dialect === 'python' && content.startsWith(triple, start)) {
    for (let index = start + 3; index < content.length; index++) {
      if (content.charAt(index) === '\\') {
        index += 1;
      } else if (content.startsWith(triple, index)) {
        return index + 3;
      }
    }
    return -1;
  }

  for (let index = start + 1; index < content.length; index++) {
    const char = content.charAt(index);
    if (char === '\\') {
      index += 1;
    } else if (char === quote) {
      return index + 1;
    } else if (char === '\n') {
      return -1;
    }
  }
  return -1;
}

/**
 * Scan template literal text from `start` up to its closing backtick or the
 * next `${`. Null when unterminated.
 */
function templateEnd(content: string, start: number): { end: number; interpolation: boolean } | null {
  for (let index = start; index < content.length; index++) {
    const char = content.charAt(index);
    if (char === '\\') {
      index += 1;
    } else if (char === '`') {
      return { end: index + 1, interpolation: false };
    } else if (char === '$' && content.charAt(index + 1) === '{') {
      return { end: index + 2, interpolation: true };
    }
  }
  return null;
}

/**
 * End of a regex literal starting at `start`, or -1 when the slash is not one
 */
function regexEnd(content: string, start: number): number {
  let inClass = false;
  for (let index = start + 1; index < content.length; index++) {
    const char = content.charAt(index);
    if (char === '\n') return -1;
    if (char === '\\') {
      index += 1;
    } else if (char === '[') {
      inClass = true;
    } else if (char === ']') {
      inClass = false;
    } else if (char === '/' && !inClass) {
      let end = index + 1;
      while (/[a-z]/i.test(content.charAt(end))) end += 1;
      return end;
    }
  }
  return -1;
}

/**
 * First bracket problem in a source file, skipping strings and comments
 */
export function findBracketProblem(content: string, dialect: ScriptDialect): string | null {
  const stack: OpenBracket[] = [];
  let line = 1;
  let index = 0;
  let lastSignificant = '';
  let lastWord = '';

  const continueTemplate = (from: number, startLine: number): string | null => {
    const scanned = templateEnd(content, from);
    if (!scanned) return `unterminated template literal starting on line ${startLine}`;
    line += countNewlines(content.slice(from, scanned.end));
    if (scanned.interpolation) {
      stack.push({ char: '{', line, template: true });
      lastSignificant = '{';
    } else {
      lastSignificant = '`';
    }
    lastWord = '';
    index = scanned.end;
    return null;
  };

  while (index < content.length) {
    const char = content.charAt(index);
    const next = content.charAt(index + 1);

    if (char === '\n') {
      line += 1;
      index += 1;
      continue;
    }
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    const lineComment = dialect === 'python' ? char === '#' : char === '/' && next === '/';
    if (lineComment) {
      const end = content.indexOf('\n', index);
      index = end === -1 ? content.length : end;
      continue;
    }
    if (dialect === 'javascript' && char === '/' && next === '*') {
      const end = content.indexOf('*/', index + 2);
      if (end === -1) return `unterminated comment starting on line ${line}`;
      line += countNewlines(content.slice(index, end));
      index = end + 2;
      continue;
    }

    if (char === '"' || char === "'") {
      const end = stringEnd(content, index, dialect);
      if (end === -1) return `unterminated string starting on line ${line}`;
      line += countNewlines(content.slice(index, end));
      index = end;
      lastSignificant = char;
      lastWord = '';
      continue;
    }
    if (dialect === 'javascript' && char === '`') {
      const problem = continueTemplate(index + 1, line);
      if (problem) return problem;
      continue;
    }
    if (
      dialect === 'javascript' &&
      char === '/' &&
      (REGEX_PRECEDERS.has(lastSignificant) || (/[\w$]/.test(lastSignificant) && REGEX_KEYWORDS.has(lastWord)))
    ) {
      const end = regexEnd(content, index);
      if (end !== -1) {
        index = end;
        lastSignificant = ')';
        lastWord = '';
        continue;
      }
    }

    IDENTIFIER.lastIndex = index;
    const word = IDENTIFIER.exec(content);
    if (word) {
      lastWord = word[0];
      lastSignificant = lastWord.charAt(lastWord.length - 1);
      index += lastWord.length;
      continue;
    }

    if (OPENERS.has(char)) {
      stack.push({ char, line, template: false });
    } else {
      const opener = CLOSERS.get(char);
      if (opener !== undefined) {
        const top = stack.pop();
        if (!top) return `unexpected '${char}' on line ${line}`;
        if (top.char !== opener) {
          return `'${char}' on line ${line} does not close '${top.char}' from line ${top.line}`;
        }
        if (top.template) {
          const problem = continueTemplate(index + 1, line);
          if (problem) return problem;
          continue;
        }
      }
    }
    lastSignificant = char;
    lastWord = '';
    index += 1;
  }

  const unclosed = stack[stack.length - 1];
  return unclosed ? `unclosed '${unclosed.char}' from line ${unclosed.line}` : null;
}

export function validateFileContent(filePath: string, content: string): string | null {
  const baseName = path.posix.basename(filePath);
  if (!content.trim()) {
    return EMPTY_ALLOWED.has(baseName) ? null : 'content is empty';
  }

  const extension = path.posix.extname(baseName).toLowerCase();
  if (extension === '.json') {
    try {
      JSON.parse(content);
      return null;
    } catch (error) {
      return `invalid JSON: ${errorMessage(error)}`;
    }
  }
  if (isRequirementsFile(baseName)) {
    return checkRequirements(content);
  }
  if (isDockerfile(baseName)) {
    return DOCKER_FROM.test(content) ? null : 'Dockerfile has no FROM instruction';
  }

  const dialect = SCRIPT_DIALECTS.get(extension);
  return dialect ? findBracketProblem(content, dialect) : null;
}
