/**
 * Engine Module - Unified Export Point
 *
 * Central export point for the repair engine
 */

// Orchestration
export { RepairOrchestrator } from './repair/orchestrator';
export type { RepairRequest, OrchestratorDependencies, BatchOptions } from './repair/orchestrator';
export { createOrchestrator } from './repair/factory';
export type { CreateOrchestratorOptions, OrchestratorSetup } from './repair/factory';
export { FixLoop, validationFailureReason } from './repair/fix-loop';
export type { FixLoopInput, FixLoopOptions, FixLoopResult, PatchValidator } from './repair/fix-loop';
export { nextFixLoopState, isTerminal, InvalidTransitionError, TERMINAL_STATES } from './repair/iteration-controller';

// Decision model
export { decide, computeRepairCost, computeSuccessProbability, optimizationSuggestions } from './decision/decision-model';
export type { DecisionOptions } from './decision/decision-model';
export { ScopeRebuildEstimator, estimateRebuildCost } from './decision/rebuild-estimator';
export type { RebuildEstimator, RebuildEstimateInput } from './decision/rebuild-estimator';

// Metrics
export { MetricsCalculator, computeModelCapability } from './metrics/metrics-calculator';
export { analyzeTechnicalDebt } from './metrics/debt-analyzer';

// Triage
export { ErrorClassifier } from './triage/error-classifier';
export { createErrorFingerprint } from './triage/error-fingerprint';

// Minimal reproduction
export { MreBuilder } from './mre/mre-builder';
export type { MinimalReproduction, MreBuildInput } from './mre/mre-builder';

// Generation
export type { GenerationClient } from './llm/generation-client';
export { parseGenerationResponse } from './llm/response-parser';
export { buildFullAnalysisPrompt, buildAlternativeApproachPrompt } from './prompt/repair-prompts';

// Validation
export { ValidationRunner, interpretOutcome } from './validation/validation-runner';
export { ShellBuildRunner, sandboxEnvironment } from './validation/container-runner';
export type { ContainerRunner, BuildTestRequest, BuildTestOutcome } from './validation/container-runner';
export { applyProposedPatch, PatchApplyError } from './patch/patch-applier';
export type { PatchRejectReason } from './patch/patch-applier';
export { validateFileContent } from './patch/content-validator';

// History
export { InMemoryHistoryStore } from './history/history-store';
export type { HistoryStore, HistoryStoreOptions } from './history/history-store';
export { SqliteHistoryStore } from './history/sqlite-history-store';

// Reports and artifacts
export { buildReport, renderReportMarkdown, repairStatistics, recommend } from './report/report-builder';
export { TicketStore } from './storage/ticket-store';

// Configuration
export { config, loadConfig, validateConfig, assertValidConfig, resolveModelProfile, MODEL_PROFILES } from './config';
export type { Config } from './config';

// Shared data model
export * from '@repairgate/shared-types';
