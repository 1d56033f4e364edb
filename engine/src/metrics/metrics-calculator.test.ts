import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProblemCategory, type HistoryRecord } from '@repairgate/shared-types';
import { loadConfig, resolveModelProfile } from '../config';
import { InMemoryHistoryStore, type HistoryStore } from '../history/history-store';
import { ErrorClassifier } from '../triage/error-classifier';
import { MetricsCalculator, computeModelCapability } from './metrics-calculator';

const cfg = loadConfig();

const TRACE = [
  'Traceback (most recent call last):',
  '  File "tests/test_calc.py", line 4, in test_add',
  '    assert add(1, 2) == 3',
  '  File "calc.py", line 2, in add',
  'TypeError: unsupported operand',
].join('\n');

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
}

function calculator(history?: HistoryStore): MetricsCalculator {
  return new MetricsCalculator({ calibration: cfg.calibration, capability: cfg.capability, history });
}

describe('computeModelCapability', () => {
  it('penalizes temperature and stays at base for baseline-sized models', () => {
    expect(computeModelCapability(resolveModelProfile('unknown'), 0, cfg.capability)).toBeCloseTo(0.46, 10);
  });

  it('adds token and context bonuses above the baseline', () => {
    // 0.7 + (16384 - 8192) * 1e-5 - 0.3 * 0.2
    expect(computeModelCapability(resolveModelProfile('codellama:13b'), 0, cfg.capability)).toBeCloseTo(
      0.72192,
      10
    );
  });

  it('clamps to [0, maxCapability]', () => {
    expect(computeModelCapability(resolveModelProfile('qwen2.5-coder:7b'), 0.3, cfg.capability)).toBe(0.95);
    expect(computeModelCapability(resolveModelProfile('mistral'), -2, cfg.capability)).toBe(0);
  });
});

describe('MetricsCalculator', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'repairgate-metrics-'));
    await writeTree(root, {
      'requirements.txt': 'pytest\n',
      'README.md': '# calc\n',
      'calc.py': 'def add(a, b):\n    return a + b\n',
      'util.py': 'def _clip(x):\n    return x\n',
      'tests/test_calc.py': 'from calc import add\n\ndef test_add():\n    assert add(1, 2) == 3\n',
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('derives coverage and context from the tree', async () => {
    const metrics = await calculator().calculate({
      sourceRoot: root,
      errorReport: ErrorClassifier.parseErrorReport(TRACE, root),
      testPath: 'tests/test_calc.py',
      modelProfile: resolveModelProfile('default'),
    });

    // 1 test / 2 sources + 0.2 for referencing `add`
    expect(metrics.testCoverage).toBeCloseTo(0.7, 10);
    expect(metrics.availableContext).toBe(1);
    expect(metrics.breakdown.contextSignals).toEqual({
      stackTrace: true,
      testFile: true,
      dependencyManifest: true,
      documentation: true,
      projectStructure: true,
    });
    expect(metrics.breakdown.sourceFileCount).toBe(2);
    expect(metrics.modelCapability).toBeCloseTo(0.46, 10);
    expect(metrics.technicalDebt).toBeGreaterThanOrEqual(0);
    expect(metrics.technicalDebt).toBeLessThanOrEqual(100);
    expect(metrics.lowConfidence).toBe(false);
    expect(metrics.diagnostics).toEqual([]);
  });

  it('loses context signals that are missing', async () => {
    await fs.rm(path.join(root, 'README.md'));
    const metrics = await calculator().calculate({
      sourceRoot: root,
      errorReport: ErrorClassifier.parseErrorReport('it broke', root),
      modelProfile: resolveModelProfile('default'),
    });

    // manifest + structure only
    expect(metrics.availableContext).toBeCloseTo(0.4, 10);
    expect(metrics.testCoverage).toBeCloseTo(0.5, 10);
    expect(metrics.diagnostics).toEqual(['error_report_unparsed']);
    expect(metrics.lowConfidence).toBe(false);
  });

  it('returns zero metrics with a diagnostic for an unreadable tree', async () => {
    const metrics = await calculator().calculate({
      sourceRoot: path.join(root, 'missing'),
      errorReport: ErrorClassifier.parseErrorReport(TRACE),
      modelProfile: resolveModelProfile('default'),
    });

    expect(metrics.technicalDebt).toBe(0);
    expect(metrics.testCoverage).toBe(0);
    expect(metrics.availableContext).toBe(0);
    expect(metrics.modelCapability).toBeCloseTo(0.46, 10);
    expect(metrics.lowConfidence).toBe(true);
    expect(metrics.diagnostics).toEqual(['source_unreadable']);
  });

  it('flags a supplied test file that cannot be read', async () => {
    const metrics = await calculator().calculate({
      sourceRoot: root,
      errorReport: ErrorClassifier.parseErrorReport(TRACE, root),
      testPath: 'tests/test_missing.py',
      modelProfile: resolveModelProfile('default'),
    });

    expect(metrics.breakdown.contextSignals.testFile).toBe(false);
    expect(metrics.diagnostics).toEqual(['test_file_unreadable']);
    expect(metrics.lowConfidence).toBe(true);
  });

  it('folds the history adjustment into capability', async () => {
    const history = new InMemoryHistoryStore({ ...cfg.history });
    const success: HistoryRecord = {
      problemCategory: ProblemCategory.TYPE_ERROR,
      modelUsed: 'default',
      outcome: 'success',
      timestamp: 1,
    };
    for (let i = 0; i < 5; i++) {
      await history.record(success);
    }

    const metrics = await calculator(history).calculate({
      sourceRoot: root,
      errorReport: ErrorClassifier.parseErrorReport(TRACE, root),
      modelProfile: resolveModelProfile('default'),
    });

    expect(metrics.breakdown.historyAdjustment).toBeCloseTo(0.15, 10);
    expect(metrics.modelCapability).toBeCloseTo(0.61, 10);
  });

  it('survives a failing history store', async () => {
    const broken: HistoryStore = {
      record: async () => undefined,
      adjustment: async () => {
        throw new Error('database is locked');
      },
      successRate: async () => ({ samples: 0, successRate: 0.5, adjustment: 0 }),
      statistics: async () => ({ total: 0, successes: 0, successRate: 0, byCategory: {}, byModel: {} }),
      close: () => undefined,
    };

    const metrics = await calculator(broken).calculate({
      sourceRoot: root,
      errorReport: ErrorClassifier.parseErrorReport(TRACE, root),
      modelProfile: resolveModelProfile('default'),
    });

    expect(metrics.diagnostics).toEqual(['history_unavailable']);
    expect(metrics.modelCapability).toBeCloseTo(0.46, 10);
  });
});
