/**
 * Repair Orchestrator
 *
 * Drives one ticket end to end:
 * 1. parse the error report and resolve the model profile
 * 2. compute metrics and decide REPAIR vs REBUILD
 * 3. on REPAIR, build the MRE and run the fix loop against it
 * 4. record the outcome in history, write the audit trail and the report
 *
 * The constructor rejects an invalid configuration with CONFIG_INVALID; after
 * that `run` never throws: every failure ends up as a diagnostic on the report.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  errorMessage,
  type DecisionResult,
  type FixAttempt,
  type FixLoopState,
  type ProposedPatch,
  type RepairMetrics,
  type RepairResult,
  type RepairTicket,
} from '@repairgate/shared-types';
import { assertValidConfig, config as defaultConfig, resolveModelProfile, type Config } from '../config';
import { computeRepairCost, computeSuccessProbability, decide } from '../decision/decision-model';
import { ScopeRebuildEstimator, estimateRebuildCost, type RebuildEstimator } from '../decision/rebuild-estimator';
import type { HistoryStore } from '../history/history-store';
import type { GenerationClient } from '../llm/generation-client';
import { createLogger } from '../logging/log';
import { MetricsCalculator } from '../metrics/metrics-calculator';
import { MreBuilder, type MinimalReproduction } from '../mre/mre-builder';
import { ParallelExecutor } from '../performance/parallel';
import { buildReport, renderReportMarkdown } from '../report/report-builder';
import { TicketStore } from '../storage/ticket-store';
import { ErrorClassifier } from '../triage/error-classifier';
import { createErrorFingerprint } from '../triage/error-fingerprint';
import type { ContainerRunner } from '../validation/container-runner';
import { ValidationRunner } from '../validation/validation-runner';
import { FixLoop } from './fix-loop';

const log = createLogger('orchestrator');

export interface RepairRequest {
  sourceRoot: string;
  /** Error text; takes precedence over `errorFile` */
  errorText?: string;
  errorFile?: string;
  testPath?: string;
  /** Free-form model name, e.g. "qwen2.5-coder:7b" */
  model?: string;
  maxIterations?: number;
  /** External rebuild estimate; replaces the estimator when given */
  rebuildCost?: number;
  ticketId?: string;
}

export interface OrchestratorDependencies {
  generator: GenerationClient;
  container: ContainerRunner;
  history: HistoryStore;
  rebuildEstimator?: RebuildEstimator;
  /** `null` disables the audit trail; defaults to `config.repair.artifactsDir` */
  ticketStore?: TicketStore | null;
  config?: Config;
  onTransition?: (ticketId: string, state: FixLoopState, index: number) => void;
}

export interface BatchOptions {
  concurrency?: number;
}

interface LoopOutcome {
  state?: FixLoopState;
  attempts: FixAttempt[];
  finalPatch: ProposedPatch | null;
  contextDegraded: boolean;
}

export class RepairOrchestrator {
  private readonly config: Config;
  private readonly metrics: MetricsCalculator;
  private readonly mreBuilder: MreBuilder;
  private readonly validator: ValidationRunner;
  private readonly rebuildEstimator: RebuildEstimator;
  private readonly ticketStore: TicketStore | null;
  private readonly executor = new ParallelExecutor();

  constructor(private readonly deps: OrchestratorDependencies) {
    this.config = deps.config ?? defaultConfig;
    assertValidConfig(this.config);
    this.metrics = new MetricsCalculator({
      calibration: this.config.calibration,
      capability: this.config.capability,
      history: deps.history,
    });
    this.mreBuilder = new MreBuilder(this.config.mre);
    this.validator = new ValidationRunner({
      container: deps.container,
      timeoutMs: this.config.repair.validationTimeoutMs,
    });
    this.rebuildEstimator = deps.rebuildEstimator ?? new ScopeRebuildEstimator(this.config.rebuild);
    this.ticketStore =
      deps.ticketStore === undefined ? new TicketStore(this.config.repair.artifactsDir) : deps.ticketStore;
  }

  async run(request: RepairRequest, signal?: AbortSignal): Promise<RepairResult> {
    const started = Date.now();
    const diagnostics: string[] = [];

    const raw = await this.readErrorText(request, diagnostics);
    const errorReport = ErrorClassifier.parseErrorReport(raw, request.sourceRoot);
    const ticket: RepairTicket = {
      ticketId: request.ticketId ?? uuidv4(),
      errorReport,
      sourceRoot: request.sourceRoot,
      testPath: request.testPath,
      modelProfile: resolveModelProfile(request.model ?? this.config.repair.defaultModel),
      maxIterations: this.maxIterations(request, diagnostics),
      createdAt: new Date(started).toISOString(),
    };
    const { ticketId } = ticket;

    log.info('Ticket opened', {
      ticketId,
      category: errorReport.category,
      fingerprint: createErrorFingerprint(errorReport),
      model: ticket.modelProfile.name,
    });
    const artifactsDir = await this.persist(diagnostics, 'ticket', store => store.createTicket(ticket));

    const metrics = await this.metrics.calculate({
      sourceRoot: request.sourceRoot,
      errorReport,
      testPath: request.testPath,
      modelProfile: ticket.modelProfile,
      diagnostics: [...diagnostics],
    });
    const { decision, decided } = await this.decide(request, metrics, diagnostics, ticketId);
    await this.persist(diagnostics, 'metrics', store => store.writeMetrics(ticketId, metrics));
    await this.persist(diagnostics, 'decision', store => store.writeDecision(ticketId, decision));
    log.info('Decision made', {
      ticketId,
      decision: decision.decision,
      repairCost: decision.repairCost,
      rebuildCost: decision.rebuildCost,
      successProbability: decision.successProbability,
    });

    const loop: LoopOutcome =
      decided && decision.decision === 'REPAIR'
        ? await this.repair(ticket, diagnostics, signal)
        : { attempts: [], finalPatch: null, contextDegraded: false };

    if (loop.finalPatch) {
      const finalPatch = loop.finalPatch;
      await this.persist(diagnostics, 'final patch', store => store.writeFinalPatch(ticketId, finalPatch));
    }
    if (loop.state === 'PASS' || loop.state === 'EXHAUSTED') {
      await this.recordHistory(ticket, loop.state === 'PASS', diagnostics);
    }

    const reportDiagnostics = [...metrics.diagnostics, ...diagnostics.filter(flag => !metrics.diagnostics.includes(flag))];
    let report = buildReport({
      ticket,
      metrics,
      decision,
      attempts: loop.attempts,
      loopState: loop.state,
      contextDegraded: loop.contextDegraded,
      diagnostics: reportDiagnostics,
      artifactsDir: artifactsDir ?? undefined,
      durationMs: Date.now() - started,
    });
    const persisted = await this.persist(diagnostics, 'report', store =>
      store.writeReport(ticketId, report, renderReportMarkdown(report))
    );
    if (persisted === null && this.ticketStore) {
      report = { ...report, diagnostics: [...report.diagnostics, 'persist_failed:report'] };
    }

    log.info('Ticket closed', {
      ticketId,
      success: loop.state === 'PASS',
      recommendation: report.recommendation,
      attempts: loop.attempts.length,
    });

    return {
      ticketId,
      decision: decision.decision,
      success: loop.state === 'PASS',
      finalPatch: loop.finalPatch,
      iterationsUsed: loop.attempts.length,
      report,
    };
  }

  /**
   * Run independent tickets with bounded concurrency. Results keep input order.
   */
  async runBatch(requests: RepairRequest[], options: BatchOptions = {}, signal?: AbortSignal): Promise<RepairResult[]> {
    log.info('Batch started', { tickets: requests.length, concurrency: options.concurrency });
    return this.executor.map(requests, request => this.run(request, signal), { concurrency: options.concurrency });
  }

  private async readErrorText(request: RepairRequest, diagnostics: string[]): Promise<string> {
    if (request.errorText !== undefined) return request.errorText;
    if (!request.errorFile) {
      diagnostics.push('error_report_unreadable');
      return '';
    }
    try {
      return await fs.readFile(path.resolve(request.errorFile), 'utf-8');
    } catch (error) {
      log.warn('Error file unreadable', { errorFile: request.errorFile, error: errorMessage(error) });
      diagnostics.push('error_report_unreadable');
      return '';
    }
  }

  private maxIterations(request: RepairRequest, diagnostics: string[]): number {
    const requested = request.maxIterations;
    if (requested === undefined) return this.config.repair.maxIterations;
    if (Number.isInteger(requested) && requested >= 1) return requested;
    diagnostics.push('max_iterations_invalid');
    return this.config.repair.maxIterations;
  }

  /**
   * `decided` is false when the decision model failed; the result then carries
   * the failure in its reasoning and no repair is attempted.
   */
  private async decide(
    request: RepairRequest,
    metrics: RepairMetrics,
    diagnostics: string[],
    ticketId: string
  ): Promise<{ decision: DecisionResult; decided: boolean }> {
    const requested = request.rebuildCost;
    const estimator: RebuildEstimator =
      requested === undefined ? this.rebuildEstimator : { estimate: () => requested };
    const estimate = await estimateRebuildCost(
      estimator,
      { sourceRoot: request.sourceRoot, metrics },
      this.config.rebuild.baselineCost
    );
    diagnostics.push(...estimate.diagnostics);
    try {
      return { decision: decide(metrics, estimate.cost, this.config.decision), decided: true };
    } catch (error) {
      log.error('Decision failed', { ticketId, rebuildCost: estimate.cost, error: errorMessage(error) });
      diagnostics.push(`decision_failed: ${errorMessage(error)}`);
      return { decision: this.undecided(metrics, estimate.cost, errorMessage(error)), decided: false };
    }
  }

  private undecided(metrics: RepairMetrics, rebuildCost: number, reason: string): DecisionResult {
    const { repairCost } = computeRepairCost(metrics, this.config.decision.epsilon);
    return {
      repairCost,
      rebuildCost,
      successProbability: computeSuccessProbability(metrics),
      decision: 'REPAIR',
      costRatio: 0,
      rebuildThreshold: this.config.decision.rebuildThreshold,
      borderline: true,
      lowConfidence: true,
      reasoning: [`Decision could not be computed: ${reason}`, 'Repair was not attempted'],
      riskFactors: [],
      weights: { ...metrics.weights },
    };
  }

  private async repair(ticket: RepairTicket, diagnostics: string[], signal?: AbortSignal): Promise<LoopOutcome> {
    const { ticketId } = ticket;
    let mre: MinimalReproduction;
    try {
      mre = await this.mreBuilder.build({
        sourceRoot: ticket.sourceRoot,
        errorReport: ticket.errorReport,
        testPath: ticket.testPath,
      });
    } catch (error) {
      log.error('MRE build failed', { ticketId, error: errorMessage(error) });
      diagnostics.push(`mre_build_failed: ${errorMessage(error)}`);
      return { attempts: [], finalPatch: null, contextDegraded: false };
    }
    diagnostics.push(...mre.diagnostics);

    const onTransition = this.deps.onTransition;
    const loop = new FixLoop({
      generator: this.deps.generator,
      validator: this.validator,
      generationTimeoutMs: this.config.repair.generationTimeoutMs,
      onTransition: onTransition ? (state, index) => onTransition(ticketId, state, index) : undefined,
      onAttempt: async attempt => {
        await this.persist(diagnostics, `attempt ${attempt.index}`, store => store.writeAttempt(ticketId, attempt));
      },
    });

    try {
      const result = await loop.run(
        {
          mreRoot: mre.workspace.root,
          files: mre.files,
          testPath: mre.testPath,
          language: mre.descriptor.language,
          errorReport: ticket.errorReport,
          modelProfile: ticket.modelProfile,
          maxIterations: ticket.maxIterations,
        },
        signal
      );
      return { ...result, contextDegraded: mre.contextDegraded };
    } catch (error) {
      log.error('Fix loop failed', { ticketId, error: errorMessage(error) });
      diagnostics.push(`fix_loop_failed: ${errorMessage(error)}`);
      return { attempts: [], finalPatch: null, contextDegraded: mre.contextDegraded };
    } finally {
      await mre.workspace.dispose();
    }
  }

  private async recordHistory(ticket: RepairTicket, success: boolean, diagnostics: string[]): Promise<void> {
    try {
      await this.deps.history.record({
        problemCategory: ticket.errorReport.category,
        modelUsed: ticket.modelProfile.name,
        outcome: success ? 'success' : 'failure',
        timestamp: Date.now(),
      });
    } catch (error) {
      log.warn('History record failed', { ticketId: ticket.ticketId, error: errorMessage(error) });
      diagnostics.push('history_record_failed');
    }
  }

  /**
   * Run a store write; a failure is logged and becomes a diagnostic.
   * Returns null when skipped or failed.
   */
  private async persist<T>(
    diagnostics: string[],
    step: string,
    write: (store: TicketStore) => Promise<T>
  ): Promise<T | null> {
    if (!this.ticketStore) return null;
    try {
      return await write(this.ticketStore);
    } catch (error) {
      log.warn('Artifact write failed', { step, error: errorMessage(error) });
      diagnostics.push(`persist_failed:${step}`);
      return null;
    }
  }
}
