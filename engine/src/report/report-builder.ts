/**
 * Report Builder - structured and markdown repair reports
 */

import type {
  DecisionResult,
  FixAttempt,
  FixLoopState,
  RepairMetrics,
  RepairRecommendation,
  RepairReport,
  RepairResult,
  RepairStatistics,
  RepairTicket,
} from '@repairgate/shared-types';
import { optimizationSuggestions } from '../decision/decision-model';

export interface ReportInput {
  ticket: RepairTicket;
  metrics: RepairMetrics;
  decision: DecisionResult;
  attempts: readonly FixAttempt[];
  /** Terminal fix loop state; absent when no repair was attempted */
  loopState?: FixLoopState;
  contextDegraded: boolean;
  diagnostics: readonly string[];
  artifactsDir?: string;
  durationMs: number;
}

/**
 * After an exhausted loop a borderline decision tips over to rebuild;
 * anything else goes to a human.
 */
export function recommend(decision: DecisionResult, loopState: FixLoopState | undefined): RepairRecommendation {
  if (decision.decision === 'REBUILD') return 'rebuild';
  if (loopState === 'PASS') return 'apply_patch';
  if (loopState === 'EXHAUSTED' && decision.borderline) return 'rebuild';
  return 'manual_review';
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

function summarize(input: ReportInput): string {
  const { decision, attempts, loopState } = input;
  if (decision.decision === 'REBUILD') {
    return (
      `Rebuild recommended: repair cost ${decision.repairCost.toFixed(2)} exceeds ` +
      `${decision.rebuildThreshold}x the rebuild cost ${decision.rebuildCost.toFixed(2)}`
    );
  }
  switch (loopState) {
    case 'PASS':
      return `Repaired after ${plural(attempts.length, 'attempt')}`;
    case 'EXHAUSTED':
      return `Repair failed after ${plural(attempts.length, 'attempt')}`;
    case 'CANCELLED':
      return `Repair cancelled after ${plural(attempts.length, 'attempt')}`;
    default:
      return 'Repair was not attempted';
  }
}

export function buildReport(input: ReportInput): RepairReport {
  const { ticket, metrics, decision } = input;
  const recommendation = recommend(decision, input.loopState);

  const suggestions = optimizationSuggestions(metrics);
  if (input.contextDegraded) {
    suggestions.push('Supply a stack trace that names project files so the reproduction can be narrowed');
  }
  if (recommendation === 'manual_review' && input.loopState === 'EXHAUSTED') {
    suggestions.push('Review the attempt log; every automated fix failed validation');
  }

  return {
    ticketId: ticket.ticketId,
    summary: summarize(input),
    decision: decision.decision,
    category: ticket.errorReport.category,
    model: ticket.modelProfile.name,
    metrics: {
      technicalDebt: metrics.technicalDebt,
      testCoverage: metrics.testCoverage,
      availableContext: metrics.availableContext,
      modelCapability: metrics.modelCapability,
    },
    decisionDetail: {
      repairCost: decision.repairCost,
      rebuildCost: decision.rebuildCost,
      successProbability: decision.successProbability,
      costRatio: decision.costRatio,
      borderline: decision.borderline,
      lowConfidence: decision.lowConfidence,
    },
    reasoning: [...decision.reasoning],
    riskFactors: [...decision.riskFactors],
    suggestions,
    attempts: input.attempts.map(attempt => ({
      index: attempt.index,
      outcome: attempt.outcome,
      reason: attempt.failureReason,
      durationMs: attempt.durationMs,
    })),
    recommendation,
    contextDegraded: input.contextDegraded,
    diagnostics: [...input.diagnostics],
    artifactsDir: input.artifactsDir,
    durationMs: input.durationMs,
  };
}

function bulletList(items: readonly string[]): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : '- none';
}

export function renderReportMarkdown(report: RepairReport): string {
  let md = `# Repair Report ${report.ticketId}\n\n`;
  md += `${report.summary}\n\n`;
  md += `- **Decision**: ${report.decision}\n`;
  md += `- **Recommendation**: ${report.recommendation}\n`;
  md += `- **Category**: ${report.category}\n`;
  md += `- **Model**: ${report.model}\n`;
  md += `- **Duration**: ${report.durationMs}ms\n`;
  if (report.contextDegraded) {
    md += `- **Context degraded**: the reproduction copies the whole source tree\n`;
  }
  md += `\n`;

  md += `## Metrics\n\n`;
  md += `| Metric | Value |\n|---|---|\n`;
  md += `| Technical debt (D) | ${report.metrics.technicalDebt.toFixed(2)} |\n`;
  md += `| Test coverage (T) | ${report.metrics.testCoverage.toFixed(3)} |\n`;
  md += `| Available context (K) | ${report.metrics.availableContext.toFixed(3)} |\n`;
  md += `| Model capability (S) | ${report.metrics.modelCapability.toFixed(3)} |\n\n`;

  const detail = report.decisionDetail;
  md += `## Decision\n\n`;
  md += `| | |\n|---|---|\n`;
  md += `| Repair cost | ${detail.repairCost.toFixed(2)} |\n`;
  md += `| Rebuild cost | ${detail.rebuildCost.toFixed(2)} |\n`;
  md += `| Cost ratio | ${detail.costRatio.toFixed(2)} |\n`;
  md += `| Success probability | ${(detail.successProbability * 100).toFixed(1)}% |\n`;
  md += `| Borderline | ${detail.borderline ? 'yes' : 'no'} |\n`;
  md += `| Low confidence | ${detail.lowConfidence ? 'yes' : 'no'} |\n\n`;

  md += `### Reasoning\n${bulletList(report.reasoning)}\n\n`;
  md += `### Risk Factors\n${bulletList(report.riskFactors)}\n\n`;
  md += `### Suggestions\n${bulletList(report.suggestions)}\n\n`;

  md += `## Attempts (${report.attempts.length})\n\n`;
  if (report.attempts.length > 0) {
    md += `| # | Outcome | Reason | Duration |\n|---|---|---|---|\n`;
    for (const attempt of report.attempts) {
      const reason = (attempt.reason ?? '').replace(/\|/g, '\\|').replace(/\n/g, ' ');
      md += `| ${attempt.index} | ${attempt.outcome} | ${reason} | ${attempt.durationMs}ms |\n`;
    }
    md += `\n`;
  }

  if (report.diagnostics.length > 0) {
    md += `## Diagnostics\n${bulletList(report.diagnostics)}\n`;
  }
  return md;
}

/**
 * Aggregate view of a batch of results
 */
export function repairStatistics(results: readonly RepairResult[]): RepairStatistics {
  const stats: RepairStatistics = {
    total: results.length,
    successes: 0,
    successRate: 0,
    averageIterations: 0,
    decisions: { REPAIR: 0, REBUILD: 0 },
    recommendations: { apply_patch: 0, rebuild: 0, manual_review: 0 },
  };
  if (results.length === 0) return stats;

  let iterations = 0;
  for (const result of results) {
    if (result.success) stats.successes += 1;
    iterations += result.iterationsUsed;
    stats.decisions[result.decision] += 1;
    stats.recommendations[result.report.recommendation] += 1;
  }
  stats.successRate = stats.successes / results.length;
  stats.averageIterations = iterations / results.length;
  return stats;
}
