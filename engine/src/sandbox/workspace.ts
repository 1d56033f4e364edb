/**
 * Sandbox Workspace - disposable directories under the OS temp dir
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { errorMessage } from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { resolvePathWithinBase } from '../security/path-safety';

const log = createLogger('sandbox');

const DEFAULT_PREFIX = 'repairgate-';

export class SandboxWorkspace {
  private disposed = false;

  private constructor(readonly root: string) {}

  /**
   * Create an empty workspace with a unique name
   */
  static async create(prefix: string = DEFAULT_PREFIX): Promise<SandboxWorkspace> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    return new SandboxWorkspace(root);
  }

  /**
   * Copy `sourceDir` into a fresh workspace. The source is never modified.
   */
  static async fork(sourceDir: string, prefix: string = `${DEFAULT_PREFIX}attempt-`): Promise<SandboxWorkspace> {
    const workspace = await SandboxWorkspace.create(prefix);
    try {
      await fs.cp(sourceDir, workspace.root, { recursive: true, dereference: true });
    } catch (error) {
      await workspace.dispose();
      throw error;
    }
    return workspace;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  resolve(relativePath: string): string {
    return resolvePathWithinBase(this.root, relativePath);
  }

  async writeFile(relativePath: string, content: string): Promise<void> {
    const target = this.resolve(relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }

  async readFile(relativePath: string): Promise<string> {
    return fs.readFile(this.resolve(relativePath), 'utf-8');
  }

  /**
   * Remove the workspace. Safe to call more than once; failures are logged.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    try {
      await fs.rm(this.root, { recursive: true, force: true });
    } catch (error) {
      log.warn('Failed to remove workspace', { root: this.root, error: errorMessage(error) });
    }
  }
}
