/**
 * Forward-import discovery for MRE neighbor expansion.
 *
 * Only project-local imports are resolved; packages and Go imports
 * (package-level, not file-level) are ignored.
 */

import path from 'path';
import type { SourceLanguage } from '../metrics/source-scanner';

const SCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

const ES_IMPORT = /\b(?:import|export)\s+(?:[^'";]*?\s+from\s+)?['"]([^'"]+)['"]/g;
const DYNAMIC_IMPORT = /\b(?:require|import)\s*\(\s*['"]([^'"]+)['"]\s*\)/g;
const PY_IMPORT = /^[ \t]*import\s+([\w.]+(?:\s*,\s*[\w.]+)*)/gm;
const PY_FROM_IMPORT = /^[ \t]*from\s+(\.*[\w.]*)\s+import\s+(\([^)]*\)|[^\n#]+)/gm;

export interface ImportSpecifier {
  specifier: string;
  /** Python `from .pkg import name`: names that may themselves be modules */
  names?: string[];
}

function collect(pattern: RegExp, content: string): string[] {
  return Array.from(content.matchAll(pattern), match => match[1] ?? '').filter(Boolean);
}

export function extractImportSpecifiers(language: SourceLanguage, content: string): ImportSpecifier[] {
  if (language === 'javascript' || language === 'typescript') {
    const specifiers = [...collect(ES_IMPORT, content), ...collect(DYNAMIC_IMPORT, content)];
    return specifiers
      .filter(specifier => specifier.startsWith('./') || specifier.startsWith('../'))
      .map(specifier => ({ specifier }));
  }

  if (language === 'python') {
    const result: ImportSpecifier[] = [];
    for (const match of content.matchAll(PY_IMPORT)) {
      for (const name of (match[1] ?? '').split(',')) {
        result.push({ specifier: name.trim() });
      }
    }
    for (const match of content.matchAll(PY_FROM_IMPORT)) {
      const names = (match[2] ?? '')
        .replace(/[()]/g, '')
        .split(',')
        .map(name => name.trim().split(/\s+/)[0] ?? '')
        .filter(name => name && name !== '*');
      result.push({ specifier: match[1] ?? '', names });
    }
    return result.filter(entry => entry.specifier);
  }

  return [];
}

function firstExisting(candidates: string[], files: ReadonlySet<string>): string | null {
  for (const candidate of candidates) {
    const normalized = path.posix.normalize(candidate);
    if (!normalized.startsWith('../') && files.has(normalized)) {
      return normalized;
    }
  }
  return null;
}

function scriptCandidates(base: string): string[] {
  const stripped = base.replace(/\.[cm]?js$/, '');
  return [
    base,
    ...SCRIPT_EXTENSIONS.map(ext => `${stripped}${ext}`),
    ...SCRIPT_EXTENSIONS.map(ext => `${base}/index${ext}`),
  ];
}

function pythonCandidates(modulePath: string): string[] {
  return [`${modulePath}.py`, `${modulePath}/__init__.py`];
}

/**
 * Resolve one import of `fromFile` to project files. Python `from x import y`
 * can yield both the module and submodule `y`.
 */
export function resolveImport(
  fromFile: string,
  language: SourceLanguage,
  entry: ImportSpecifier,
  files: ReadonlySet<string>
): string[] {
  const dir = path.posix.dirname(fromFile);

  if (language === 'javascript' || language === 'typescript') {
    const resolved = firstExisting(scriptCandidates(path.posix.join(dir, entry.specifier)), files);
    return resolved ? [resolved] : [];
  }

  if (language !== 'python') return [];

  const dots = /^\.*/.exec(entry.specifier)?.[0].length ?? 0;
  const dotted = entry.specifier.slice(dots);
  const moduleSuffix = dotted ? dotted.replace(/\./g, '/') : '';

  const bases: string[] = [];
  if (dots > 0) {
    let base = dir;
    for (let i = 1; i < dots; i++) {
      base = path.posix.dirname(base);
    }
    bases.push(base);
  } else {
    // absolute module: project root first, then the importing file's directory
    bases.push('.', dir);
  }

  const resolved: string[] = [];
  for (const base of bases) {
    const modulePath = moduleSuffix ? path.posix.join(base, moduleSuffix) : base;
    const found = moduleSuffix ? firstExisting(pythonCandidates(modulePath), files) : null;
    if (found) resolved.push(found);

    for (const name of entry.names ?? []) {
      const submodule = firstExisting(pythonCandidates(path.posix.join(modulePath, name)), files);
      if (submodule) resolved.push(submodule);
    }
    if (resolved.length > 0) break;
  }

  if (resolved.length === 0 && dots > 0 && !moduleSuffix) {
    const init = firstExisting([path.posix.join(bases[0] ?? dir, '__init__.py')], files);
    if (init) resolved.push(init);
  }
  return Array.from(new Set(resolved));
}
