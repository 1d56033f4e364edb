/**
 * Validation Runner
 *
 * Validates a proposed patch against an MRE:
 * 1. read the sandbox descriptor and fork the MRE into a fresh workspace
 *    (the MRE itself is never touched)
 * 2. apply the patch; a rejected patch short-circuits without the container
 * 3. run one build + test cycle through the container collaborator
 * 4. interpret exit status and output into a ValidationResult
 *
 * Collaborator failures become results with a marker in `stderr`
 * (`[timeout]`, `[patch-rejected]`, `[container-error]`). Only cancellation
 * propagates, as OperationCancelledError.
 */

import {
  OperationCancelledError,
  OperationTimeoutError,
  ProblemCategory,
  errorMessage,
  type ProposedPatch,
  type ValidationPhase,
  type ValidationResult,
} from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { readSandboxDescriptor, type SandboxDescriptor } from '../mre/sandbox-descriptor';
import { PatchApplyError, applyProposedPatch } from '../patch/patch-applier';
import { SandboxWorkspace } from '../sandbox/workspace';
import { ErrorClassifier } from '../triage/error-classifier';
import { runWithTimeout, throwIfAborted } from '../utils/abort';
import type { BuildTestOutcome, ContainerRunner } from './container-runner';

const log = createLogger('validation');

export const TIMEOUT_MARKER = '[timeout]';
export const PATCH_REJECTED_MARKER = '[patch-rejected]';
export const CONTAINER_ERROR_MARKER = '[container-error]';

const DEFAULT_GUARD_GRACE_MS = 5000;

/** Output in these categories means the build (not the tests) failed */
const BUILD_FAILURE_CATEGORIES = new Set<ProblemCategory>([
  ProblemCategory.SYNTAX_ERROR,
  ProblemCategory.IMPORT_ERROR,
  ProblemCategory.DEPENDENCY_CONFLICT,
]);

export interface ValidationRunnerOptions {
  container: ContainerRunner;
  timeoutMs: number;
  /** Extra time the collaborator gets to report its own timeout before the guard fires */
  guardGraceMs?: number;
}

function failed(
  phase: ValidationPhase,
  applied: boolean,
  stderr: string,
  started: number,
  extra: Partial<ValidationResult> = {}
): ValidationResult {
  return {
    applied,
    buildSucceeded: false,
    testsPassed: false,
    stdout: '',
    stderr,
    durationMs: Date.now() - started,
    timedOut: false,
    phase,
    ...extra,
  };
}

/**
 * Turn a collaborator outcome into a ValidationResult (workspace already patched)
 */
export function interpretOutcome(outcome: BuildTestOutcome, durationMs: number): ValidationResult {
  const base = {
    applied: true,
    stdout: outcome.stdout,
    durationMs,
  };

  if (outcome.timedOut) {
    const phase = outcome.phase ?? 'test';
    return {
      ...base,
      buildSucceeded: phase === 'test',
      testsPassed: false,
      stderr: `${TIMEOUT_MARKER} ${phase} phase exceeded its time limit\n${outcome.stderr}`.trim(),
      timedOut: true,
      phase,
    };
  }

  if (outcome.exitCode === 0) {
    return { ...base, buildSucceeded: true, testsPassed: true, stderr: outcome.stderr, timedOut: false };
  }

  let phase: 'build' | 'test';
  if (outcome.phase) {
    phase = outcome.phase;
  } else {
    const category = ErrorClassifier.categorize(`${outcome.stdout}\n${outcome.stderr}`);
    phase = BUILD_FAILURE_CATEGORIES.has(category) ? 'build' : 'test';
  }

  return {
    ...base,
    buildSucceeded: phase === 'test',
    testsPassed: false,
    stderr: outcome.stderr,
    timedOut: false,
    phase,
  };
}

function formatPatchRejection(error: unknown): string {
  if (!(error instanceof PatchApplyError)) {
    return `${PATCH_REJECTED_MARKER} ${errorMessage(error)}`;
  }
  const lines = [`${PATCH_REJECTED_MARKER} ${error.reason}: ${error.message}`];
  for (const hint of error.diagnostics.candidateHints ?? []) {
    lines.push(`closest match at lines ${hint.lineStart}-${hint.lineEnd}:`, hint.snippet);
  }
  return lines.join('\n');
}

export class ValidationRunner {
  constructor(private readonly options: ValidationRunnerOptions) {}

  /**
   * Validate `patch` against the MRE rooted at `mreRoot`
   */
  async validate(mreRoot: string, patch: ProposedPatch, signal?: AbortSignal): Promise<ValidationResult> {
    const started = Date.now();
    throwIfAborted(signal, 'validation');

    // The descriptor comes from the unpatched MRE so a patch cannot change the commands
    let descriptor: SandboxDescriptor;
    let workspace: SandboxWorkspace;
    try {
      descriptor = await readSandboxDescriptor(mreRoot);
      workspace = await SandboxWorkspace.fork(mreRoot);
    } catch (error) {
      log.error('Failed to prepare MRE workspace', { mreRoot, error: errorMessage(error) });
      const message = `${CONTAINER_ERROR_MARKER} could not prepare workspace: ${errorMessage(error)}`;
      return failed('build', false, message, started);
    }

    try {
      try {
        await applyProposedPatch(workspace.root, patch);
      } catch (error) {
        log.info('Patch rejected', { error: errorMessage(error) });
        return failed('patch', false, formatPatchRejection(error), started);
      }

      let outcome: BuildTestOutcome;
      try {
        outcome = await runWithTimeout(
          childSignal =>
            this.options.container.buildAndTest({
              workspace: workspace.root,
              descriptor,
              timeoutMs: this.options.timeoutMs,
              signal: childSignal,
            }),
          this.options.timeoutMs + (this.options.guardGraceMs ?? DEFAULT_GUARD_GRACE_MS),
          signal,
          'validation'
        );
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        if (error instanceof OperationTimeoutError) {
          log.warn('Validation timed out', { timeoutMs: this.options.timeoutMs });
          // Unknown how far the collaborator got, so the build is not claimed
          return failed(
            'build',
            true,
            `${TIMEOUT_MARKER} validation exceeded ${this.options.timeoutMs}ms`,
            started,
            { timedOut: true }
          );
        }
        log.error('Container collaborator failed', { error: errorMessage(error) });
        return failed('build', true, `${CONTAINER_ERROR_MARKER} ${errorMessage(error)}`, started);
      }

      throwIfAborted(signal, 'validation');
      const result = interpretOutcome(outcome, Date.now() - started);
      log.info('Validation finished', {
        buildSucceeded: result.buildSucceeded,
        testsPassed: result.testsPassed,
        timedOut: result.timedOut,
        phase: result.phase,
      });
      return result;
    } finally {
      await workspace.dispose();
    }
  }
}
