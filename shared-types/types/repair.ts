/**
 * Repair Engine Types
 *
 * Data model shared by the decision model, the fix loop and the report writer.
 * Everything produced by the engine is treated as immutable once returned.
 */

/**
 * Problem categories used for history aggregation
 */
export enum ProblemCategory {
  /** Missing module, unresolved import */
  IMPORT_ERROR = 'import_error',
  /** Type mismatch, missing attribute, wrong call signature */
  TYPE_ERROR = 'type_error',
  /** Parser/compiler syntax failure */
  SYNTAX_ERROR = 'syntax_error',
  /** Uncaught exception at run time */
  RUNTIME_EXCEPTION = 'runtime_exception',
  /** Assertion or test runner failure */
  TEST_FAILURE = 'test_failure',
  /** Package resolution or version conflict */
  DEPENDENCY_CONFLICT = 'dependency_conflict',
  /** Operation exceeded its time budget */
  TIMEOUT = 'timeout',
  /** Anything the taxonomy does not recognise */
  UNKNOWN = 'unknown',
}

export const PROBLEM_CATEGORIES: readonly ProblemCategory[] = Object.values(ProblemCategory);

/**
 * One frame extracted from a stack trace or compiler diagnostic
 */
export interface StackFrame {
  /** Path as written in the trace (made relative when inside the source root) */
  file: string;
  /** Line number (1-based) */
  line?: number;
  /** Column number */
  column?: number;
  /** Function or symbol the frame points at */
  symbol?: string;
}

/**
 * Parsed error report attached to a ticket
 */
export interface ErrorReport {
  /** Raw error text as supplied */
  raw: string;
  /** Unique source paths referenced by the trace, in order of appearance */
  referencedPaths: string[];
  category: ProblemCategory;
  /** Identifiers implicated by the error (frame functions, quoted names) */
  symbols: string[];
  frames: StackFrame[];
}

// ============================================================================
// Model profiles
// ============================================================================

export type ModelId =
  | 'qwen2.5-coder'
  | 'deepseek-coder'
  | 'codellama'
  | 'deepseek-r1'
  | 'granite-code'
  | 'mistral'
  | 'default';

/**
 * Capability profile of a generation model
 */
export interface ModelProfile {
  id: ModelId;
  /** Name as requested by the caller (e.g. "qwen2.5-coder:7b") */
  name: string;
  /** Output token limit */
  maxTokens: number;
  /** Sampling temperature */
  temperature: number;
  /** Prior capability estimate in [0,1] */
  baseCapability: number;
  /** Context window in tokens */
  contextWindow: number;
}

// ============================================================================
// Metrics and decision
// ============================================================================

export interface CalibrationWeights {
  /** Repair cost scale */
  gamma: number;
  /** Coverage penalty on repair cost */
  lambda: number;
  /** Context weight in success probability */
  alpha: number;
  /** Coverage weight in success probability */
  beta: number;
  /** Capability weight in success probability */
  gammaPrime: number;
  /** Debt weight in success probability */
  delta: number;
}

export type ContextSignal =
  | 'stackTrace'
  | 'testFile'
  | 'dependencyManifest'
  | 'documentation'
  | 'projectStructure';

export interface MetricsBreakdown {
  branchScore: number;
  duplicationScore: number;
  documentationScore: number;
  sourceFileCount: number;
  testFileCount: number;
  contextSignals: Record<ContextSignal, boolean>;
  /** History term already folded into modelCapability */
  historyAdjustment: number;
}

export interface RepairMetrics {
  /** Raw debt score in [0,100] */
  technicalDebt: number;
  /** [0,1] */
  testCoverage: number;
  /** [0,1] */
  availableContext: number;
  /** [0, maxCapability] */
  modelCapability: number;
  weights: CalibrationWeights;
  lowConfidence: boolean;
  diagnostics: string[];
  breakdown: MetricsBreakdown;
}

export type RepairDecision = 'REPAIR' | 'REBUILD';

export interface DecisionResult {
  repairCost: number;
  rebuildCost: number;
  /** [0,1] */
  successProbability: number;
  decision: RepairDecision;
  /** repairCost / rebuildCost */
  costRatio: number;
  rebuildThreshold: number;
  /** Close to the rebuild line, or unlikely to succeed */
  borderline: boolean;
  /** A denominator was clamped or the metrics themselves are low-confidence */
  lowConfidence: boolean;
  reasoning: string[];
  riskFactors: string[];
  weights: CalibrationWeights;
}

// ============================================================================
// Tickets and attempts
// ============================================================================

export interface RepairTicket {
  ticketId: string;
  errorReport: ErrorReport;
  sourceRoot: string;
  testPath?: string;
  modelProfile: ModelProfile;
  maxIterations: number;
  /** ISO timestamp */
  createdAt: string;
}

/**
 * Candidate change proposed by the generation model
 */
export interface ProposedPatch {
  /** Unified diff text (may be empty when only full files are given) */
  diff: string;
  /** Relative path -> full replacement content */
  files: Record<string, string>;
  analysis: string;
  explanation: string;
  regressionRisk: string;
}

export type FixAttemptOutcome = 'PASS' | 'FAIL' | 'ERROR';

export type ValidationPhase = 'patch' | 'build' | 'test';

export interface ValidationResult {
  applied: boolean;
  buildSucceeded: boolean;
  testsPassed: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  /** Step that failed; absent on success */
  phase?: ValidationPhase;
}

export interface FixAttempt {
  /** 0-based */
  index: number;
  prompt: string;
  /** Raw model output, null when generation itself failed */
  response: string | null;
  proposedPatch: ProposedPatch | null;
  validationResult: ValidationResult | null;
  outcome: FixAttemptOutcome;
  failureReason?: string;
  /** ISO timestamp */
  startedAt: string;
  durationMs: number;
}

export type FixLoopState =
  | 'PENDING'
  | 'GENERATING'
  | 'VALIDATING'
  | 'RETRY'
  | 'PASS'
  | 'EXHAUSTED'
  | 'CANCELLED';

// ============================================================================
// History
// ============================================================================

export type HistoryOutcome = 'success' | 'failure';

export interface HistoryRecord {
  problemCategory: ProblemCategory;
  modelUsed: string;
  outcome: HistoryOutcome;
  /** Epoch milliseconds */
  timestamp: number;
}

export interface OutcomeCounts {
  total: number;
  successes: number;
  successRate: number;
}

export interface HistoryStatistics extends OutcomeCounts {
  byCategory: Partial<Record<ProblemCategory, OutcomeCounts>>;
  byModel: Record<string, OutcomeCounts>;
}

// ============================================================================
// Result and report
// ============================================================================

export type RepairRecommendation = 'apply_patch' | 'rebuild' | 'manual_review';

export interface AttemptSummary {
  index: number;
  outcome: FixAttemptOutcome;
  reason?: string;
  durationMs: number;
}

export interface RepairReport {
  ticketId: string;
  summary: string;
  decision: RepairDecision;
  category: ProblemCategory;
  model: string;
  metrics: {
    technicalDebt: number;
    testCoverage: number;
    availableContext: number;
    modelCapability: number;
  };
  decisionDetail: {
    repairCost: number;
    rebuildCost: number;
    successProbability: number;
    costRatio: number;
    borderline: boolean;
    lowConfidence: boolean;
  };
  reasoning: string[];
  riskFactors: string[];
  suggestions: string[];
  attempts: AttemptSummary[];
  recommendation: RepairRecommendation;
  contextDegraded: boolean;
  diagnostics: string[];
  artifactsDir?: string;
  durationMs: number;
}

export interface RepairResult {
  ticketId: string;
  decision: RepairDecision;
  success: boolean;
  finalPatch: ProposedPatch | null;
  iterationsUsed: number;
  report: RepairReport;
}

export interface RepairStatistics {
  total: number;
  successes: number;
  successRate: number;
  averageIterations: number;
  decisions: Record<RepairDecision, number>;
  recommendations: Record<RepairRecommendation, number>;
}
