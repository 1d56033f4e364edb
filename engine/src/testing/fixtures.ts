/**
 * Shared builders for unit tests.
 */

import {
  ProblemCategory,
  type CalibrationWeights,
  type FixAttempt,
  type ModelProfile,
  type RepairMetrics,
  type RepairTicket,
} from '@repairgate/shared-types';

export const DEFAULT_WEIGHTS: CalibrationWeights = {
  gamma: 1.0,
  lambda: 0.5,
  alpha: 0.4,
  beta: 0.3,
  gammaPrime: 0.5,
  delta: 0.2,
};

export function metricsFor(
  values: { D: number; T: number; K: number; S: number },
  overrides: Partial<RepairMetrics> = {}
): RepairMetrics {
  return {
    technicalDebt: values.D,
    testCoverage: values.T,
    availableContext: values.K,
    modelCapability: values.S,
    weights: { ...DEFAULT_WEIGHTS },
    lowConfidence: false,
    diagnostics: [],
    breakdown: {
      branchScore: 0,
      duplicationScore: 0,
      documentationScore: 0,
      sourceFileCount: 4,
      testFileCount: 1,
      contextSignals: {
        stackTrace: true,
        testFile: false,
        dependencyManifest: true,
        documentation: false,
        projectStructure: true,
      },
      historyAdjustment: 0,
    },
    ...overrides,
  };
}

export const TEST_PROFILE: ModelProfile = {
  id: 'qwen2.5-coder',
  name: 'qwen2.5-coder:7b',
  maxTokens: 16384,
  temperature: 0.2,
  baseCapability: 0.85,
  contextWindow: 32768,
};

export function ticketFor(overrides: Partial<RepairTicket> = {}): RepairTicket {
  return {
    ticketId: 'ticket-1',
    errorReport: {
      raw: 'AssertionError: assert -1 == 3',
      referencedPaths: ['calc.py'],
      category: ProblemCategory.TEST_FAILURE,
      symbols: ['add'],
      frames: [{ file: 'calc.py', line: 2, symbol: 'add' }],
    },
    sourceRoot: '/tmp/project',
    modelProfile: TEST_PROFILE,
    maxIterations: 5,
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function attemptFor(index: number, outcome: FixAttempt['outcome'], failureReason?: string): FixAttempt {
  return {
    index,
    prompt: `prompt ${index}`,
    response: `response ${index}`,
    proposedPatch: null,
    validationResult: null,
    outcome,
    failureReason,
    startedAt: '2024-01-01T00:00:00.000Z',
    durationMs: 5,
  };
}
