/**
 * Metrics Calculator
 *
 * Derives technical debt (D), test coverage (T), available context (K) and
 * model capability (S) for one repair ticket. Input problems degrade the
 * metrics and raise `lowConfidence`; they never throw.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  errorMessage,
  type CalibrationWeights,
  type ContextSignal,
  type ErrorReport,
  type ModelProfile,
  type RepairMetrics,
} from '@repairgate/shared-types';
import type { Config } from '../config';
import { createLogger } from '../logging/log';
import type { HistoryStore } from '../history/history-store';
import { analyzeTechnicalDebt, clamp } from './debt-analyzer';
import {
  MANIFEST_FILES,
  detectProjectLanguage,
  scanSourceTree,
  type SourceTree,
} from './source-scanner';

const log = createLogger('metrics');

/** Each present context signal adds this much to K */
export const CONTEXT_SIGNAL_WEIGHT = 0.2;
const COVERAGE_SYMBOL_BOOST = 0.2;

/** Diagnostics that mark the metrics as low-confidence */
const LOW_CONFIDENCE_FLAGS = new Set([
  'source_unreadable',
  'no_source_files',
  'error_report_unreadable',
  'test_file_unreadable',
]);

export interface MetricsInput {
  sourceRoot: string;
  errorReport: ErrorReport;
  /** Absolute, or relative to sourceRoot */
  testPath?: string;
  modelProfile: ModelProfile;
  /** Upstream input problems (e.g. unreadable error file) */
  diagnostics?: string[];
}

export interface MetricsCalculatorOptions {
  calibration: CalibrationWeights;
  capability: Config['capability'];
  history?: HistoryStore;
}

/**
 * base + token bonus + context bonus - temperature penalty + history adjustment,
 * clamped to [0, maxCapability]
 */
export function computeModelCapability(
  profile: ModelProfile,
  historyAdjustment: number,
  capability: Config['capability']
): number {
  const tokenBonus = Math.max(0, profile.maxTokens - capability.baselineUnits) * capability.tokenBonusPerUnit;
  const contextBonus =
    Math.max(0, profile.contextWindow - capability.baselineUnits) * capability.contextBonusPerUnit;
  const temperaturePenalty = profile.temperature * capability.temperaturePenalty;

  return clamp(
    profile.baseCapability + tokenBonus + contextBonus - temperaturePenalty + historyAdjustment,
    0,
    capability.maxCapability
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function referencesSymbol(content: string, symbols: string[]): boolean {
  return symbols.some(symbol => new RegExp(`\\b${escapeRegExp(symbol)}\\b`).test(content));
}

function emptySignals(): Record<ContextSignal, boolean> {
  return {
    stackTrace: false,
    testFile: false,
    dependencyManifest: false,
    documentation: false,
    projectStructure: false,
  };
}

export class MetricsCalculator {
  constructor(private readonly options: MetricsCalculatorOptions) {}

  async calculate(input: MetricsInput): Promise<RepairMetrics> {
    const diagnostics = [...(input.diagnostics ?? [])];
    const historyAdjustment = await this.historyAdjustment(input, diagnostics);
    const modelCapability = computeModelCapability(
      input.modelProfile,
      historyAdjustment,
      this.options.capability
    );

    let tree: SourceTree;
    try {
      tree = await scanSourceTree(input.sourceRoot);
    } catch (error) {
      log.warn('Source tree unreadable, using zero metrics', {
        sourceRoot: input.sourceRoot,
        error: errorMessage(error),
      });
      diagnostics.push('source_unreadable');
      return {
        technicalDebt: 0,
        testCoverage: 0,
        availableContext: 0,
        modelCapability,
        weights: { ...this.options.calibration },
        lowConfidence: true,
        diagnostics,
        breakdown: {
          branchScore: 0,
          duplicationScore: 0,
          documentationScore: 0,
          sourceFileCount: 0,
          testFileCount: 0,
          contextSignals: emptySignals(),
          historyAdjustment,
        },
      };
    }

    if (tree.sourceFiles.length === 0) {
      diagnostics.push('no_source_files');
    }
    if (input.errorReport.frames.length === 0) {
      diagnostics.push('error_report_unparsed');
    }

    const debt = analyzeTechnicalDebt(tree.sourceFiles);
    const testContents = tree.testFiles.map(file => file.content);
    const suppliedTest = await this.readSuppliedTest(input, tree);
    if (suppliedTest !== null && !testContents.includes(suppliedTest.content)) {
      testContents.push(suppliedTest.content);
    }
    if (input.testPath && suppliedTest === null) {
      diagnostics.push('test_file_unreadable');
    }

    const testCoverage = this.coverage(tree.sourceFiles.length, testContents, input.errorReport.symbols);
    const contextSignals: Record<ContextSignal, boolean> = {
      stackTrace: input.errorReport.frames.length > 0,
      testFile: suppliedTest !== null,
      dependencyManifest: tree.allFiles.some(file => MANIFEST_FILES.includes(file)),
      documentation: tree.allFiles.some(file => /^readme(\.\w+)?$/i.test(file) || file.startsWith('docs/')),
      projectStructure: detectProjectLanguage(tree.allFiles) !== 'unknown',
    };
    const availableContext = clamp(
      Object.values(contextSignals).filter(Boolean).length * CONTEXT_SIGNAL_WEIGHT,
      0,
      1
    );

    const metrics: RepairMetrics = {
      technicalDebt: debt.technicalDebt,
      testCoverage,
      availableContext,
      modelCapability,
      weights: { ...this.options.calibration },
      lowConfidence: diagnostics.some(flag => LOW_CONFIDENCE_FLAGS.has(flag)),
      diagnostics,
      breakdown: {
        branchScore: debt.branchScore,
        duplicationScore: debt.duplicationScore,
        documentationScore: debt.documentationScore,
        sourceFileCount: tree.sourceFiles.length,
        testFileCount: testContents.length,
        contextSignals,
        historyAdjustment,
      },
    };

    log.info('Metrics computed', {
      D: metrics.technicalDebt,
      T: metrics.testCoverage,
      K: metrics.availableContext,
      S: metrics.modelCapability,
      diagnostics,
    });
    return metrics;
  }

  private async historyAdjustment(input: MetricsInput, diagnostics: string[]): Promise<number> {
    if (!this.options.history) return 0;
    try {
      return await this.options.history.adjustment(input.errorReport.category);
    } catch (error) {
      log.warn('History adjustment unavailable', { error: errorMessage(error) });
      diagnostics.push('history_unavailable');
      return 0;
    }
  }

  private async readSuppliedTest(
    input: MetricsInput,
    tree: SourceTree
  ): Promise<{ path: string; content: string } | null> {
    if (!input.testPath) return null;
    const absolutePath = path.resolve(tree.root, input.testPath);
    try {
      return { path: absolutePath, content: await fs.readFile(absolutePath, 'utf-8') };
    } catch {
      return null;
    }
  }

  private coverage(sourceCount: number, testContents: string[], symbols: string[]): number {
    if (sourceCount === 0) return 0;
    const ratio = testContents.length / sourceCount;
    const boost =
      symbols.length > 0 && testContents.some(content => referencesSymbol(content, symbols))
        ? COVERAGE_SYMBOL_BOOST
        : 0;
    return clamp(ratio + boost, 0, 1);
  }
}
