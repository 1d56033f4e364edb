import { existsSync, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RepairGateError, errorMessage, type FixLoopState } from '@repairgate/shared-types';
import { loadConfig, type Config } from '../config';
import { InMemoryHistoryStore } from '../history/history-store';
import { MreBuilder, type MreBuildInput } from '../mre/mre-builder';
import { TicketStore } from '../storage/ticket-store';
import {
  ContentCheckContainer,
  ScriptedGenerationClient,
  hangingReply,
  patchResponse,
  type ScriptedReply,
} from '../testing/doubles';
import { FixLoop } from './fix-loop';
import { RepairOrchestrator, type OrchestratorDependencies, type RepairRequest } from './orchestrator';

const WRONG_FIX = '--- a/calc.py\n+++ b/calc.py\n@@ -1,2 +1,2 @@\n def add(a, b):\n-    return a - b\n+    return b - a\n';
const RIGHT_FIX = '--- a/calc.py\n+++ b/calc.py\n@@ -1,2 +1,2 @@\n def add(a, b):\n-    return a - b\n+    return a + b\n';

const TRACEBACK = [
  'Traceback (most recent call last):',
  '  File "tests/test_calc.py", line 5, in test_add',
  '    assert add(1, 2) == 3',
  '  File "calc.py", line 2, in add',
  'AssertionError: assert -1 == 3',
  '',
].join('\n');

const base = loadConfig();
const CONFIG: Config = {
  ...base,
  repair: { ...base.repair, maxIterations: 5, generationTimeoutMs: 1000, validationTimeoutMs: 2000 },
};

describe('RepairOrchestrator', () => {
  let workDir: string;
  let sourceRoot: string;
  let artifactsDir: string;
  let history: InMemoryHistoryStore;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repairgate-orchestrator-'));
    sourceRoot = path.join(workDir, 'project');
    artifactsDir = path.join(workDir, 'repairs');
    await fs.mkdir(path.join(sourceRoot, 'tests'), { recursive: true });
    await fs.writeFile(path.join(sourceRoot, 'calc.py'), 'def add(a, b):\n    return a - b\n', 'utf-8');
    await fs.writeFile(
      path.join(sourceRoot, 'tests', 'test_calc.py'),
      'from calc import add\n\n\ndef test_add():\n    assert add(1, 2) == 3\n',
      'utf-8'
    );
    await fs.writeFile(path.join(sourceRoot, 'requirements.txt'), 'pytest\n', 'utf-8');
    history = new InMemoryHistoryStore({ decayFactor: 0.9, minSamples: 5, weight: 0.3, windowSize: 1000 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    history.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  function orchestrator(
    replies: ScriptedReply[],
    overrides: Partial<OrchestratorDependencies> = {}
  ): { orchestrator: RepairOrchestrator; generator: ScriptedGenerationClient; container: ContentCheckContainer } {
    const generator = new ScriptedGenerationClient(replies);
    const container = new ContentCheckContainer('calc.py', 'a + b');
    const instance = new RepairOrchestrator({
      generator,
      container,
      history,
      ticketStore: new TicketStore(artifactsDir),
      config: CONFIG,
      ...overrides,
    });
    return { orchestrator: instance, generator, container };
  }

  function request(overrides: Partial<RepairRequest> = {}): RepairRequest {
    return {
      sourceRoot,
      errorText: TRACEBACK,
      testPath: 'tests/test_calc.py',
      model: 'qwen2.5-coder:7b',
      rebuildCost: 1000,
      ticketId: 'T-1',
      ...overrides,
    };
  }

  /** Roots of every MRE built during the test */
  function trackMreRoots(): string[] {
    const roots: string[] = [];
    const build = MreBuilder.prototype.build;
    vi.spyOn(MreBuilder.prototype, 'build').mockImplementation(async function (
      this: MreBuilder,
      input: MreBuildInput
    ) {
      const mre = await build.call(this, input);
      roots.push(mre.workspace.root);
      return mre;
    });
    return roots;
  }

  async function readArtifact(...segments: string[]): Promise<string> {
    return fs.readFile(path.join(artifactsDir, 'T-1', ...segments), 'utf-8');
  }

  it('repairs on the second attempt and writes the audit trail', async () => {
    const { orchestrator: instance } = orchestrator([patchResponse(WRONG_FIX), patchResponse(RIGHT_FIX)]);

    const result = await instance.run(request());

    expect(result).toMatchObject({ ticketId: 'T-1', decision: 'REPAIR', success: true, iterationsUsed: 2 });
    expect(result.finalPatch?.diff).toBe(RIGHT_FIX);
    expect(result.report.recommendation).toBe('apply_patch');
    expect(result.report.attempts.map(attempt => attempt.outcome)).toEqual(['FAIL', 'PASS']);
    expect(result.report.artifactsDir).toBe(path.join(artifactsDir, 'T-1'));

    expect(await readArtifact('final.patch')).toBe(RIGHT_FIX);
    expect(await readArtifact('attempts', '01', 'response.txt')).toBe(patchResponse(RIGHT_FIX));
    expect((await readArtifact('attempts', '00', 'prompt.md')).startsWith('# Repair Task\n\n')).toBe(true);
    expect(JSON.parse(await readArtifact('decision.json'))).toMatchObject({ decision: 'REPAIR', rebuildCost: 1000 });
    expect(JSON.parse(await readArtifact('report.json'))).toMatchObject({ ticketId: 'T-1', recommendation: 'apply_patch' });
    expect((await readArtifact('report.md')).startsWith('# Repair Report T-1\n\nRepaired after 2 attempts\n')).toBe(true);
    await expect(readArtifact('final-files.json')).rejects.toThrow();

    expect(await fs.readFile(path.join(sourceRoot, 'calc.py'), 'utf-8')).toBe('def add(a, b):\n    return a - b\n');
    expect(await history.statistics()).toMatchObject({ total: 1, successes: 1 });
  });

  it('stops at the decision when rebuilding is cheaper', async () => {
    const { orchestrator: instance, generator } = orchestrator([patchResponse(RIGHT_FIX)]);

    const result = await instance.run(request({ rebuildCost: 1 }));

    expect(result).toMatchObject({ decision: 'REBUILD', success: false, iterationsUsed: 0, finalPatch: null });
    expect(result.report.recommendation).toBe('rebuild');
    expect(generator.prompts).toHaveLength(0);
    expect((await history.statistics()).total).toBe(0);
  });

  it('exhausts the budget on unparsable answers without throwing', async () => {
    const { orchestrator: instance, container } = orchestrator(['I am not sure what is wrong here.']);

    const result = await instance.run(request({ maxIterations: 2 }));

    expect(result).toMatchObject({ decision: 'REPAIR', success: false, iterationsUsed: 2 });
    expect(result.report.attempts.map(attempt => attempt.reason)).toEqual([
      'parse_failed (no_json): No JSON object found in model output',
      'parse_failed (no_json): No JSON object found in model output',
    ]);
    expect(result.report.recommendation).toBe('manual_review');
    expect(container.calls).toBe(0);
    expect(await history.statistics()).toMatchObject({ total: 1, successes: 0 });
  });

  it('degrades to the whole tree when the error file cannot be read', async () => {
    const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)]);

    const result = await instance.run(request({ errorText: undefined, errorFile: path.join(workDir, 'missing.log') }));

    expect(result.success).toBe(true);
    expect(result.report.contextDegraded).toBe(true);
    expect(result.report.diagnostics).toContain('error_report_unreadable');
    expect(result.report.diagnostics).toContain('mre_no_referenced_files');
  });

  it('reports a missing source root instead of throwing', async () => {
    const { orchestrator: instance, generator } = orchestrator([patchResponse(RIGHT_FIX)]);

    const result = await instance.run(request({ sourceRoot: path.join(workDir, 'nowhere') }));

    expect(result).toMatchObject({ decision: 'REPAIR', success: false, iterationsUsed: 0 });
    expect(result.report.diagnostics).toContain('source_unreadable');
    expect(result.report.diagnostics.some(flag => flag.startsWith('mre_build_failed: '))).toBe(true);
    expect(result.report.recommendation).toBe('manual_review');
    expect(generator.prompts).toHaveLength(0);
  });

  it('keeps going when the audit trail cannot be written', async () => {
    const blocked = path.join(workDir, 'blocked');
    await fs.writeFile(blocked, 'not a directory', 'utf-8');
    const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)], {
      ticketStore: new TicketStore(blocked),
    });

    const result = await instance.run(request());

    expect(result.success).toBe(true);
    expect(result.report.artifactsDir).toBeUndefined();
    expect(result.report.diagnostics).toContain('persist_failed:ticket');
    expect(result.report.diagnostics).toContain('persist_failed:report');
  });

  it('reports transitions with the ticket id', async () => {
    const seen: Array<[string, FixLoopState, number]> = [];
    const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)], {
      onTransition: (ticketId, state, index) => seen.push([ticketId, state, index]),
    });

    await instance.run(request());

    expect(seen).toEqual([
      ['T-1', 'GENERATING', 0],
      ['T-1', 'VALIDATING', 0],
      ['T-1', 'PASS', 0],
    ]);
  });

  it('runs a batch and returns results in input order', async () => {
    const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)]);

    const results = await instance.runBatch(
      [request({ ticketId: 'batch-1' }), request({ ticketId: 'batch-2', rebuildCost: 1 })],
      { concurrency: 2 }
    );

    expect(results.map(result => [result.ticketId, result.decision, result.success])).toEqual([
      ['batch-1', 'REPAIR', true],
      ['batch-2', 'REBUILD', false],
    ]);
  });

  it('refuses an invalid configuration', () => {
    let error: unknown;
    try {
      orchestrator([], { config: { ...CONFIG, rebuild: { ...CONFIG.rebuild, baselineCost: 0 } } });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(RepairGateError);
    expect(error instanceof RepairGateError ? error.code : undefined).toBe('CONFIG_INVALID');
    expect(errorMessage(error)).toBe('Invalid configuration: REBUILD_BASELINE_COST must be positive, got 0');
  });

  it('decides against the baseline when the requested rebuild cost is invalid', async () => {
    const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)]);

    const result = await instance.run(request({ rebuildCost: -5 }));

    expect(result.report.diagnostics).toContain('rebuild_estimate_invalid');
    expect(JSON.parse(await readArtifact('decision.json'))).toMatchObject({ rebuildCost: CONFIG.rebuild.baselineCost });
  });

  it('reports a decision failure instead of throwing', async () => {
    const config: Config = { ...CONFIG, rebuild: { ...CONFIG.rebuild } };
    const { orchestrator: instance, generator } = orchestrator([patchResponse(RIGHT_FIX)], { config });
    config.rebuild.baselineCost = 0;

    const result = await instance.run(request({ rebuildCost: Number.NaN }));

    expect(result).toMatchObject({ decision: 'REPAIR', success: false, iterationsUsed: 0, finalPatch: null });
    expect(result.report.diagnostics).toContain('rebuild_estimate_invalid');
    expect(result.report.diagnostics).toContain('decision_failed: rebuildCost must be a positive finite number, got 0');
    expect(result.report.recommendation).toBe('manual_review');
    expect(generator.prompts).toHaveLength(0);
  });

  it('writes each attempt before the next one starts', async () => {
    const written: boolean[] = [];
    const firstAttempt = path.join(artifactsDir, 'T-1', 'attempts', '00', 'attempt.json');
    const { orchestrator: instance } = orchestrator([patchResponse(WRONG_FIX), patchResponse(RIGHT_FIX)], {
      onTransition: (_ticketId, state, index) => {
        if (state === 'GENERATING') written.push(existsSync(firstAttempt));
      },
    });

    const result = await instance.run(request());

    expect(result.success).toBe(true);
    expect(written).toEqual([false, true]);
    expect(JSON.parse(await readArtifact('attempts', '01', 'attempt.json'))).toMatchObject({ index: 1, outcome: 'PASS' });
  });

  describe('MRE cleanup', () => {
    it('removes the MRE after a successful repair', async () => {
      const roots = trackMreRoots();
      const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)]);

      const result = await instance.run(request());

      expect(result.success).toBe(true);
      expect(roots).toHaveLength(1);
      expect(roots.map(root => existsSync(root))).toEqual([false]);
    });

    it('removes the MRE when the budget is exhausted', async () => {
      const roots = trackMreRoots();
      const { orchestrator: instance } = orchestrator([patchResponse(WRONG_FIX)]);

      const result = await instance.run(request({ maxIterations: 2 }));

      expect(result.report.attempts.map(attempt => attempt.outcome)).toEqual(['FAIL', 'FAIL']);
      expect(roots).toHaveLength(1);
      expect(roots.map(root => existsSync(root))).toEqual([false]);
    });

    it('removes the MRE when the ticket is cancelled', async () => {
      const roots = trackMreRoots();
      const controller = new AbortController();
      const { orchestrator: instance } = orchestrator([
        signal => {
          controller.abort();
          return hangingReply(signal);
        },
      ]);

      const result = await instance.run(request(), controller.signal);

      expect(result.success).toBe(false);
      expect(result.report.attempts.map(attempt => attempt.reason)).toEqual(['cancelled']);
      expect(roots).toHaveLength(1);
      expect(roots.map(root => existsSync(root))).toEqual([false]);
    });

    it('removes the MRE when the fix loop itself fails', async () => {
      const roots = trackMreRoots();
      vi.spyOn(FixLoop.prototype, 'run').mockRejectedValue(new Error('loop exploded'));
      const { orchestrator: instance } = orchestrator([patchResponse(RIGHT_FIX)]);

      const result = await instance.run(request());

      expect(result).toMatchObject({ success: false, iterationsUsed: 0 });
      expect(result.report.diagnostics).toContain('fix_loop_failed: loop exploded');
      expect(roots).toHaveLength(1);
      expect(roots.map(root => existsSync(root))).toEqual([false]);
    });
  });
});
