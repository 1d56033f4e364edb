/**
 * Fix Loop - bounded generate / validate iteration for one ticket
 *
 * Driven by `nextFixLoopState`: every attempt is appended to the attempt list
 * whatever its outcome, generation and validation are timeout-bounded, and
 * collaborator failures become FAIL attempts that consume one iteration.
 */

import {
  OperationCancelledError,
  OperationTimeoutError,
  errorMessage,
  type ErrorReport,
  type FixAttempt,
  type FixAttemptOutcome,
  type FixLoopState,
  type ModelProfile,
  type ProposedPatch,
  type ValidationResult,
} from '@repairgate/shared-types';
import type { GenerationClient } from '../llm/generation-client';
import { parseGenerationResponse } from '../llm/response-parser';
import { createLogger } from '../logging/log';
import { matchReferencedPath } from '../mre/mre-builder';
import { SANDBOX_META_DIR } from '../mre/sandbox-descriptor';
import {
  buildAlternativeApproachPrompt,
  buildFullAnalysisPrompt,
  collectPromptFiles,
  type PreviousAttempt,
  type PromptContext,
} from '../prompt/repair-prompts';
import { runWithTimeout, throwIfAborted } from '../utils/abort';
import type { ValidationRunner } from '../validation/validation-runner';
import { isTerminal, nextFixLoopState, type FixLoopEvent, type FixLoopPosition } from './iteration-controller';

const log = createLogger('fix-loop');

export type PatchValidator = Pick<ValidationRunner, 'validate'>;

export type FixLoopTerminalState = Extract<FixLoopState, 'PASS' | 'EXHAUSTED' | 'CANCELLED'>;

export interface FixLoopOptions {
  generator: GenerationClient;
  validator: PatchValidator;
  generationTimeoutMs: number;
  onTransition?: (state: FixLoopState, index: number) => void;
  /** Awaited after each attempt is appended, before the next one starts */
  onAttempt?: (attempt: FixAttempt) => void | Promise<void>;
}

export interface FixLoopInput {
  /** Root of the MRE; never modified by the loop */
  mreRoot: string;
  /** Files copied into the MRE, relative to its root */
  files: string[];
  testPath?: string;
  language: string;
  errorReport: ErrorReport;
  modelProfile: ModelProfile;
  maxIterations: number;
}

export interface FixLoopResult {
  state: FixLoopTerminalState;
  attempts: FixAttempt[];
  /** Patch of the passing attempt */
  finalPatch: ProposedPatch | null;
}

interface AttemptDraft {
  prompt: string;
  response: string | null;
  proposedPatch: ProposedPatch | null;
  validationResult: ValidationResult | null;
}

const MAX_FAILURE_DETAIL = 4000;

/**
 * Short machine-readable reason for a failed validation
 */
export function validationFailureReason(result: ValidationResult): string {
  if (result.timedOut) return 'validation_timeout';
  switch (result.phase) {
    case 'patch':
      return 'patch_rejected';
    case 'build':
      return 'build_failed';
    default:
      return 'tests_failed';
  }
}

function failureDetail(attempt: FixAttempt): string {
  const validation = attempt.validationResult;
  if (validation) {
    const output = [validation.stderr, validation.stdout].filter(text => text.trim()).join('\n');
    return output.slice(-MAX_FAILURE_DETAIL) || attempt.failureReason || 'validation failed';
  }
  return attempt.failureReason || 'attempt failed';
}

function isMetaFile(file: string): boolean {
  return file.startsWith(`${SANDBOX_META_DIR}/`);
}

export class FixLoop {
  constructor(private readonly options: FixLoopOptions) {}

  async run(input: FixLoopInput, signal?: AbortSignal): Promise<FixLoopResult> {
    if (input.maxIterations < 1) {
      throw new RangeError(`maxIterations must be >= 1, got ${input.maxIterations}`);
    }

    const attempts: FixAttempt[] = [];
    let position: FixLoopPosition = { state: 'PENDING', index: 0 };
    const advance = (event: FixLoopEvent) => {
      position = nextFixLoopState(position, event, input.maxIterations);
      this.notify(position);
    };

    let context: PromptContext;
    try {
      throwIfAborted(signal, 'fix loop');
      context = await this.promptContext(input);
    } catch (error) {
      if (!(error instanceof OperationCancelledError)) throw error;
      advance('cancel');
      return { state: 'CANCELLED', attempts, finalPatch: null };
    }

    advance('start');
    let finalPatch: ProposedPatch | null = null;

    while (!isTerminal(position.state)) {
      if (position.state === 'RETRY') {
        advance('retry');
        continue;
      }

      const index = position.index;
      const previous = attempts[attempts.length - 1];
      const startedAt = new Date();
      const draft: AttemptDraft = {
        prompt: this.buildPrompt(context, previous),
        response: null,
        proposedPatch: null,
        validationResult: null,
      };

      let outcome: FixAttemptOutcome;
      let failureReason: string | undefined;
      let cancelled = false;

      try {
        ({ outcome, failureReason } = await this.attempt(input, draft, signal, () => advance('patch_ready')));
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          cancelled = true;
          outcome = 'ERROR';
          failureReason = 'cancelled';
        } else {
          log.error('Attempt failed with an internal error', { index, error: errorMessage(error) });
          outcome = 'ERROR';
          failureReason = `internal_error: ${errorMessage(error)}`;
        }
      }

      const attempt: FixAttempt = {
        index,
        prompt: draft.prompt,
        response: draft.response,
        proposedPatch: draft.proposedPatch,
        validationResult: draft.validationResult,
        outcome,
        failureReason,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
      };
      attempts.push(attempt);
      log.info('Attempt finished', { index, outcome, failureReason });
      await this.record(attempt);

      if (cancelled) {
        advance('cancel');
      } else if (outcome === 'PASS') {
        finalPatch = draft.proposedPatch;
        advance('attempt_passed');
      } else {
        advance('attempt_failed');
      }
    }

    if (position.state === 'PASS' || position.state === 'EXHAUSTED' || position.state === 'CANCELLED') {
      return { state: position.state, attempts, finalPatch };
    }
    throw new Error(`Fix loop stopped in non-terminal state ${position.state}`);
  }

  /**
   * One generate + validate cycle. Fills `draft` as it goes so a failure
   * still leaves the evidence collected so far.
   */
  private async attempt(
    input: FixLoopInput,
    draft: AttemptDraft,
    signal: AbortSignal | undefined,
    onPatchReady: () => void
  ): Promise<{ outcome: FixAttemptOutcome; failureReason?: string }> {
    let response: string;
    try {
      response = await runWithTimeout(
        childSignal => this.options.generator.generate(draft.prompt, input.modelProfile, childSignal),
        this.options.generationTimeoutMs,
        signal,
        'generation'
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      if (error instanceof OperationTimeoutError) {
        return { outcome: 'FAIL', failureReason: `generation_timeout: ${error.message}` };
      }
      return { outcome: 'FAIL', failureReason: `generation_failed: ${errorMessage(error)}` };
    }
    draft.response = response;

    const parsed = parseGenerationResponse(response);
    if (!parsed.ok) {
      return { outcome: 'FAIL', failureReason: `parse_failed (${parsed.reason}): ${parsed.message}` };
    }

    draft.proposedPatch = parsed.patch;
    onPatchReady();

    const result = await this.options.validator.validate(input.mreRoot, parsed.patch, signal);
    draft.validationResult = result;
    if (result.testsPassed) {
      return { outcome: 'PASS' };
    }
    return { outcome: 'FAIL', failureReason: validationFailureReason(result) };
  }

  private buildPrompt(context: PromptContext, previous: FixAttempt | undefined): string {
    if (!previous) {
      return buildFullAnalysisPrompt(context);
    }
    const last: PreviousAttempt = {
      index: previous.index,
      patch: previous.proposedPatch,
      failure: failureDetail(previous),
    };
    return buildAlternativeApproachPrompt(context, last);
  }

  private async promptContext(input: FixLoopInput): Promise<PromptContext> {
    const sources = input.files.filter(file => !isMetaFile(file) && file !== input.testPath);
    const referenced = new Set<string>();
    const fileSet = new Set(sources);
    for (const reference of input.errorReport.referencedPaths) {
      const match = matchReferencedPath(reference, fileSet);
      if (match) referenced.add(match);
    }
    const ordered = [...referenced, ...sources.filter(file => !referenced.has(file))];

    const files = await collectPromptFiles(input.mreRoot, ordered);
    const testFile = input.testPath ? (await collectPromptFiles(input.mreRoot, [input.testPath]))[0] : undefined;

    return {
      errorReport: input.errorReport,
      files,
      testFile,
      language: input.language,
    };
  }

  private async record(attempt: FixAttempt): Promise<void> {
    if (!this.options.onAttempt) return;
    try {
      await this.options.onAttempt(attempt);
    } catch (error) {
      log.warn('onAttempt hook threw', { index: attempt.index, error: errorMessage(error) });
    }
  }

  private notify(position: FixLoopPosition): void {
    log.debug('Fix loop transition', position);
    if (!this.options.onTransition) return;
    try {
      this.options.onTransition(position.state, position.index);
    } catch (error) {
      log.warn('onTransition hook threw', { error: errorMessage(error) });
    }
  }
}
