/**
 * MRE Builder
 *
 * Extracts a minimal reproducible environment for a repair ticket: the files
 * named by the error report, their forward-import neighbors up to
 * `neighborDepth`, root manifests and the failing test, copied into an
 * isolated workspace together with the error text and a sandbox descriptor.
 *
 * When nothing in the report resolves to a project file, the whole source tree
 * is copied instead (bounded by maxFiles / maxBytes) and the MRE is flagged
 * `contextDegraded`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage, type ErrorReport } from '@repairgate/shared-types';
import type { Config } from '../config';
import { createLogger } from '../logging/log';
import {
  MANIFEST_FILES,
  detectProjectLanguage,
  languageForPath,
  listProjectFiles,
} from '../metrics/source-scanner';
import { relativeWithinBase, resolvePathWithinBase, toPosixPath } from '../security/path-safety';
import { SandboxWorkspace } from '../sandbox/workspace';
import { extractImportSpecifiers, resolveImport } from './import-resolver';
import {
  SANDBOX_DESCRIPTOR_PATH,
  SANDBOX_META_DIR,
  buildSandboxDescriptor,
  type SandboxDescriptor,
} from './sandbox-descriptor';

const log = createLogger('mre');

export const MRE_META_DIR = SANDBOX_META_DIR;
export const MRE_ERROR_FILE = `${MRE_META_DIR}/error.txt`;
export const MRE_DESCRIPTOR_FILE = SANDBOX_DESCRIPTOR_PATH;

export type MreOptions = Config['mre'];

export interface MreBuildInput {
  sourceRoot: string;
  errorReport: ErrorReport;
  /** Absolute, or relative to sourceRoot */
  testPath?: string;
}

export interface MinimalReproduction {
  workspace: SandboxWorkspace;
  descriptor: SandboxDescriptor;
  files: string[];
  contextDegraded: boolean;
  diagnostics: string[];
  /** Test file inside the MRE, relative to its root */
  testPath?: string;
}

export interface FileSelection {
  files: string[];
  contextDegraded: boolean;
  diagnostics: string[];
  testPath?: string;
}

/**
 * Map a path from the error report to a project file. Paths recorded from a
 * different working directory are matched on their longest common suffix.
 */
export function matchReferencedPath(reference: string, files: ReadonlySet<string>): string | null {
  const posix = toPosixPath(reference).replace(/^(\.\/)+/, '');
  if (files.has(posix)) return posix;

  const candidates = Array.from(files)
    .filter(file => posix.endsWith(`/${file}`) || file.endsWith(`/${posix}`))
    .sort((a, b) => b.length - a.length);
  return candidates[0] ?? null;
}

function pythonPackageInits(file: string, files: ReadonlySet<string>): string[] {
  const inits: string[] = [];
  let dir = path.posix.dirname(file);
  while (dir !== '.' && dir !== '/') {
    const init = `${dir}/__init__.py`;
    if (files.has(init)) inits.push(init);
    dir = path.posix.dirname(dir);
  }
  return inits;
}

export class MreBuilder {
  constructor(private readonly options: MreOptions) {}

  async build(input: MreBuildInput): Promise<MinimalReproduction> {
    const allFiles = await listProjectFiles(input.sourceRoot);
    const selection = await this.selectFiles(input, allFiles);
    const workspace = await SandboxWorkspace.create('repairgate-mre-');

    try {
      for (const file of selection.files) {
        const target = workspace.resolve(file);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.copyFile(resolvePathWithinBase(input.sourceRoot, file), target);
      }

      const manifestText = await this.readManifests(input.sourceRoot, selection.files);
      const descriptor = buildSandboxDescriptor({
        language: detectProjectLanguage(allFiles),
        manifestText,
        files: selection.files,
        testPath: selection.testPath,
        contextDegraded: selection.contextDegraded,
      });

      await workspace.writeFile(MRE_ERROR_FILE, input.errorReport.raw);
      await workspace.writeFile(MRE_DESCRIPTOR_FILE, JSON.stringify(descriptor, null, 2));

      log.info('MRE built', {
        root: workspace.root,
        files: selection.files.length,
        language: descriptor.language,
        contextDegraded: selection.contextDegraded,
      });

      return {
        workspace,
        descriptor,
        files: selection.files,
        contextDegraded: selection.contextDegraded,
        diagnostics: selection.diagnostics,
        testPath: selection.testPath,
      };
    } catch (error) {
      await workspace.dispose();
      throw error;
    }
  }

  /**
   * Choose the files that go into the MRE. Exposed for inspection without copying.
   */
  async selectFiles(input: MreBuildInput, allFiles: string[]): Promise<FileSelection> {
    const fileSet = new Set(allFiles);
    const diagnostics: string[] = [];

    const always = MANIFEST_FILES.filter(manifest => fileSet.has(manifest));
    const testPath = this.resolveTestPath(input, fileSet, diagnostics);
    if (testPath) always.push(testPath);

    const seeds = new Set<string>();
    for (const reference of input.errorReport.referencedPaths) {
      const match = matchReferencedPath(reference, fileSet);
      if (match) seeds.add(match);
    }

    if (seeds.size === 0) {
      diagnostics.push('mre_no_referenced_files');
      log.warn('No referenced file resolved, falling back to the whole tree', {
        referencedPaths: input.errorReport.referencedPaths,
      });
      const files = await this.boundedTree(input.sourceRoot, always, allFiles, diagnostics);
      return { files, contextDegraded: true, diagnostics, testPath };
    }

    const selected = new Set<string>([...always, ...seeds]);
    // The test's own imports (fixtures, helpers) are neighbours too
    let frontier = testPath && !seeds.has(testPath) ? [...seeds, testPath] : Array.from(seeds);
    for (let depth = 0; depth < this.options.neighborDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const file of frontier) {
        for (const neighbor of await this.neighbors(input.sourceRoot, file, fileSet)) {
          if (!selected.has(neighbor)) {
            selected.add(neighbor);
            next.push(neighbor);
          }
        }
      }
      frontier = next;
    }

    for (const file of Array.from(selected)) {
      if (file.endsWith('.py')) {
        pythonPackageInits(file, fileSet).forEach(init => selected.add(init));
      }
    }

    return { files: Array.from(selected).sort(), contextDegraded: false, diagnostics, testPath };
  }

  private resolveTestPath(
    input: MreBuildInput,
    files: ReadonlySet<string>,
    diagnostics: string[]
  ): string | undefined {
    if (!input.testPath) return undefined;
    const relative = relativeWithinBase(input.sourceRoot, input.testPath);
    if (relative && files.has(relative)) return relative;
    diagnostics.push('mre_test_file_missing');
    return undefined;
  }

  private async neighbors(sourceRoot: string, file: string, files: ReadonlySet<string>): Promise<string[]> {
    const language = languageForPath(file);
    if (!language) return [];

    let content: string;
    try {
      content = await fs.readFile(resolvePathWithinBase(sourceRoot, file), 'utf-8');
    } catch (error) {
      log.warn('Could not read file for import scan', { file, error: errorMessage(error) });
      return [];
    }

    return extractImportSpecifiers(language, content).flatMap(entry =>
      resolveImport(file, language, entry, files)
    );
  }

  private async boundedTree(
    sourceRoot: string,
    always: string[],
    allFiles: string[],
    diagnostics: string[]
  ): Promise<string[]> {
    const ordered = Array.from(new Set([...always, ...allFiles]));
    const files: string[] = [];
    let bytes = 0;

    for (const file of ordered) {
      const stat = await fs.stat(resolvePathWithinBase(sourceRoot, file));
      if (files.length >= this.options.maxFiles || bytes + stat.size > this.options.maxBytes) {
        diagnostics.push('mre_truncated');
        log.warn('Whole-tree MRE truncated at size cap', {
          files: files.length,
          bytes,
          maxFiles: this.options.maxFiles,
          maxBytes: this.options.maxBytes,
        });
        break;
      }
      files.push(file);
      bytes += stat.size;
    }
    return files.sort();
  }

  private async readManifests(sourceRoot: string, files: string[]): Promise<string> {
    const manifests = files.filter(file => MANIFEST_FILES.includes(file));
    const contents = await Promise.all(
      manifests.map(file => fs.readFile(resolvePathWithinBase(sourceRoot, file), 'utf-8'))
    );
    return contents.join('\n');
  }
}
