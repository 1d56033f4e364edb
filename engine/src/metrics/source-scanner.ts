/**
 * Source Scanner - enumerate and load the source files of a project tree
 */

import { glob } from 'glob';
import { promises as fs } from 'fs';
import path from 'path';

export type SourceLanguage =
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'go'
  | 'ruby'
  | 'rust'
  | 'java'
  | 'php'
  | 'csharp'
  | 'kotlin';

export type ProjectLanguage = SourceLanguage | 'unknown';

export interface SourceFile {
  /** Posix path relative to the scanned root */
  path: string;
  language: SourceLanguage;
  isTest: boolean;
  content: string;
}

export interface SourceTree {
  root: string;
  /** Every non-ignored file, relative */
  allFiles: string[];
  /** Non-test source files */
  sourceFiles: SourceFile[];
  testFiles: SourceFile[];
}

export const IGNORED_DIRECTORIES = [
  'node_modules',
  '.git',
  'dist',
  'build',
  '__pycache__',
  '.venv',
  'venv',
  'coverage',
  '.repairgate',
];

const IGNORE_GLOBS = IGNORED_DIRECTORIES.map(dir => `**/${dir}/**`);

const EXTENSION_LANGUAGE: Record<string, SourceLanguage> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.go': 'go',
  '.rb': 'ruby',
  '.rs': 'rust',
  '.java': 'java',
  '.php': 'php',
  '.cs': 'csharp',
  '.kt': 'kotlin',
};

/**
 * Manifest file -> language, checked before the extension census
 */
export const MANIFEST_LANGUAGE: Record<string, SourceLanguage> = {
  'requirements.txt': 'python',
  'pyproject.toml': 'python',
  'setup.py': 'python',
  Pipfile: 'python',
  'tsconfig.json': 'typescript',
  'package.json': 'javascript',
  'go.mod': 'go',
  Gemfile: 'ruby',
  'Cargo.toml': 'rust',
  'pom.xml': 'java',
  'build.gradle': 'java',
  'composer.json': 'php',
};

export const MANIFEST_FILES = Object.keys(MANIFEST_LANGUAGE);

const TEST_FILE_PATTERNS = [
  /(^|\/)test_[^/]+\.py$/,
  /_test\.(py|go)$/,
  /\.(test|spec)\.[cm]?[jt]sx?$/,
  /_spec\.rb$/,
  /(^|\/)(tests?|__tests__|spec)\//,
];

const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;

export function languageForPath(filePath: string): SourceLanguage | undefined {
  return EXTENSION_LANGUAGE[path.extname(filePath).toLowerCase()];
}

export function isTestPath(relativePath: string): boolean {
  return TEST_FILE_PATTERNS.some(pattern => pattern.test(relativePath));
}

/**
 * Detect the project language from root manifests, then by extension census.
 * A tsconfig.json next to package.json makes the project TypeScript.
 */
export function detectProjectLanguage(relativePaths: string[]): ProjectLanguage {
  const rootNames = new Set(relativePaths.filter(p => !p.includes('/')));
  for (const [manifest, language] of Object.entries(MANIFEST_LANGUAGE)) {
    if (rootNames.has(manifest)) {
      return language;
    }
  }

  const census = new Map<SourceLanguage, number>();
  for (const relativePath of relativePaths) {
    const language = languageForPath(relativePath);
    if (language) {
      census.set(language, (census.get(language) ?? 0) + 1);
    }
  }

  let best: ProjectLanguage = 'unknown';
  let bestCount = 0;
  for (const [language, count] of census) {
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}

/**
 * List every file below `root`, skipping dependency, build and VCS directories.
 * Rejects when `root` is missing or not a directory.
 */
export async function listProjectFiles(root: string): Promise<string[]> {
  const stat = await fs.stat(root);
  if (!stat.isDirectory()) {
    throw new Error(`Not a directory: ${root}`);
  }

  const files = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
    ignore: IGNORE_GLOBS,
  });
  return files.sort();
}

/**
 * Scan a project tree and load the contents of its source files
 */
export async function scanSourceTree(
  root: string,
  options: { maxFileBytes?: number } = {}
): Promise<SourceTree> {
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const allFiles = await listProjectFiles(root);
  const sourceFiles: SourceFile[] = [];
  const testFiles: SourceFile[] = [];

  for (const relativePath of allFiles) {
    const language = languageForPath(relativePath);
    if (!language) continue;

    const absolutePath = path.join(root, relativePath);
    const stat = await fs.stat(absolutePath);
    if (stat.size > maxFileBytes) continue;

    const file: SourceFile = {
      path: relativePath,
      language,
      isTest: isTestPath(relativePath),
      content: await fs.readFile(absolutePath, 'utf-8'),
    };
    (file.isTest ? testFiles : sourceFiles).push(file);
  }

  return { root, allFiles, sourceFiles, testFiles };
}
