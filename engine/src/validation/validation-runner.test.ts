import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OperationCancelledError, type ProposedPatch } from '@repairgate/shared-types';
import { SANDBOX_DESCRIPTOR_PATH, buildSandboxDescriptor, type SandboxDescriptor } from '../mre/sandbox-descriptor';
import { CommandRunner, type CommandResult } from './command-runner';
import {
  ShellBuildRunner,
  expandCommandTemplate,
  type BuildTestOutcome,
  type BuildTestRequest,
  type ContainerRunner,
} from './container-runner';
import { ValidationRunner, interpretOutcome } from './validation-runner';

const BROKEN = 'def add(a, b):\n    return a - b\n';

const FIX: ProposedPatch = {
  diff: ['--- a/calc.py', '+++ b/calc.py', '@@ -1,2 +1,2 @@', ' def add(a, b):', '-    return a - b', '+    return a + b'].join(
    '\n'
  ),
  files: {},
  analysis: 'subtraction instead of addition',
  explanation: 'use +',
  regressionRisk: 'low',
};

const STALE: ProposedPatch = {
  ...FIX,
  diff: ['--- a/calc.py', '+++ b/calc.py', '@@ -1,1 +1,1 @@', '-def mul(a, b):', '+def mul(x, y):'].join('\n'),
};

/**
 * Passes when calc.py adds, like a real pytest run would
 */
class CalcContainer implements ContainerRunner {
  calls = 0;

  async buildAndTest(request: BuildTestRequest): Promise<BuildTestOutcome> {
    this.calls += 1;
    const source = await fs.readFile(path.join(request.workspace, 'calc.py'), 'utf-8');
    return source.includes('a + b')
      ? { exitCode: 0, stdout: '1 passed', stderr: '', durationMs: 5 }
      : { exitCode: 1, stdout: '1 failed', stderr: 'AssertionError: assert -1 == 3', durationMs: 5 };
  }
}

function outcome(overrides: Partial<BuildTestOutcome>): BuildTestOutcome {
  return { exitCode: 1, stdout: '', stderr: '', durationMs: 1, ...overrides };
}

describe('ValidationRunner', () => {
  let mreRoot: string;
  const descriptor = buildSandboxDescriptor({
    language: 'python',
    manifestText: '',
    files: ['calc.py'],
    contextDegraded: false,
  });

  beforeEach(async () => {
    mreRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'repairgate-validation-'));
    await fs.writeFile(path.join(mreRoot, 'calc.py'), BROKEN, 'utf-8');
    await fs.mkdir(path.join(mreRoot, '.repairgate'));
    await fs.writeFile(path.join(mreRoot, SANDBOX_DESCRIPTOR_PATH), JSON.stringify(descriptor), 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(mreRoot, { recursive: true, force: true });
  });

  it('passes a correct patch without touching the MRE', async () => {
    const container = new CalcContainer();
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });

    const result = await runner.validate(mreRoot, FIX);

    expect(result).toMatchObject({
      applied: true,
      buildSucceeded: true,
      testsPassed: true,
      stdout: '1 passed',
      timedOut: false,
    });
    expect(result.phase).toBeUndefined();
    expect(await fs.readFile(path.join(mreRoot, 'calc.py'), 'utf-8')).toBe(BROKEN);
  });

  it('gives the same verdict when the same patch is validated twice', async () => {
    const runner = new ValidationRunner({ container: new CalcContainer(), timeoutMs: 1000 });

    const first = await runner.validate(mreRoot, FIX);
    const second = await runner.validate(mreRoot, FIX);

    expect(second.testsPassed).toBe(first.testsPassed);
    expect(second.testsPassed).toBe(true);
  });

  it('reports failing tests after a successful build', async () => {
    const runner = new ValidationRunner({ container: new CalcContainer(), timeoutMs: 1000 });
    const noop: ProposedPatch = { ...FIX, diff: '', files: { 'notes.txt': 'nothing' } };

    const result = await runner.validate(mreRoot, noop);

    expect(result).toMatchObject({
      applied: true,
      buildSucceeded: true,
      testsPassed: false,
      stderr: 'AssertionError: assert -1 == 3',
      phase: 'test',
    });
  });

  it('short-circuits a rejected patch without calling the container', async () => {
    const container = new CalcContainer();
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });

    const result = await runner.validate(mreRoot, STALE);

    expect(container.calls).toBe(0);
    expect(result).toMatchObject({ applied: false, buildSucceeded: false, testsPassed: false, phase: 'patch' });
    expect(result.stderr.split('\n')[0]).toBe('[patch-rejected] HUNK_NO_MATCH: Hunk 1 does not match calc.py');
  });

  it('marks a hung collaborator as timed out', async () => {
    const container: ContainerRunner = {
      buildAndTest: () => new Promise<BuildTestOutcome>(() => undefined),
    };
    const runner = new ValidationRunner({ container, timeoutMs: 20, guardGraceMs: 0 });

    const result = await runner.validate(mreRoot, FIX);

    expect(result).toMatchObject({
      applied: true,
      buildSucceeded: false,
      testsPassed: false,
      timedOut: true,
      phase: 'build',
    });
    expect(result.stderr).toBe('[timeout] validation exceeded 20ms');
  });

  it('hands the container the descriptor of the unpatched MRE', async () => {
    const seen: SandboxDescriptor[] = [];
    const container: ContainerRunner = {
      buildAndTest: async request => {
        seen.push(request.descriptor);
        return outcome({ exitCode: 0 });
      },
    };
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });

    await runner.validate(mreRoot, FIX);

    expect(seen).toEqual([descriptor]);
  });

  it('rejects a patch that rewrites the sandbox descriptor', async () => {
    const seen: string[] = [];
    const container: ContainerRunner = {
      buildAndTest: async request => {
        seen.push(request.descriptor.testCommand);
        return outcome({ exitCode: request.descriptor.testCommand === 'true' ? 0 : 1 });
      },
    };
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });
    const forged = JSON.stringify({ ...descriptor, installCommand: '', testCommand: 'true' });
    const hijack: ProposedPatch = { ...FIX, diff: '', files: { [SANDBOX_DESCRIPTOR_PATH]: forged } };

    const result = await runner.validate(mreRoot, hijack);

    expect(seen).toEqual([]);
    expect(result).toMatchObject({ applied: false, testsPassed: false, phase: 'patch' });
    expect(result.stderr).toBe(
      '[patch-rejected] UNSAFE_PATH: Path is reserved for the engine: .repairgate/sandbox.json'
    );
    expect(JSON.parse(await fs.readFile(path.join(mreRoot, SANDBOX_DESCRIPTOR_PATH), 'utf-8'))).toEqual(descriptor);
  });

  it('reports a missing descriptor before touching the container', async () => {
    await fs.rm(path.join(mreRoot, SANDBOX_DESCRIPTOR_PATH));
    const container = new CalcContainer();
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });

    const result = await runner.validate(mreRoot, FIX);

    expect(container.calls).toBe(0);
    expect(result).toMatchObject({ applied: false, buildSucceeded: false, phase: 'build' });
    expect(result.stderr.startsWith('[container-error] could not prepare workspace: ')).toBe(true);
  });

  it('records a crashing collaborator as a container error', async () => {
    const container: ContainerRunner = {
      buildAndTest: vi.fn(async () => {
        throw new Error('docker daemon unavailable');
      }),
    };
    const runner = new ValidationRunner({ container, timeoutMs: 1000 });

    const result = await runner.validate(mreRoot, FIX);

    expect(result.stderr).toBe('[container-error] docker daemon unavailable');
    expect(result.testsPassed).toBe(false);
  });

  it('reports a missing MRE as a container error', async () => {
    const runner = new ValidationRunner({ container: new CalcContainer(), timeoutMs: 1000 });

    const result = await runner.validate(path.join(mreRoot, 'gone'), FIX);

    expect(result.applied).toBe(false);
    expect(result.stderr.startsWith('[container-error] could not prepare workspace')).toBe(true);
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    const container: ContainerRunner = {
      buildAndTest: () => {
        controller.abort();
        return new Promise<BuildTestOutcome>(() => undefined);
      },
    };
    const runner = new ValidationRunner({ container, timeoutMs: 10_000 });

    await expect(runner.validate(mreRoot, FIX, controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
  });
});

describe('interpretOutcome', () => {
  it('lets a reported phase decide', () => {
    const result = interpretOutcome(outcome({ exitCode: 2, stderr: 'AssertionError', phase: 'build' }), 3);
    expect(result).toMatchObject({ buildSucceeded: false, testsPassed: false, phase: 'build' });
  });

  it('classifies syntax, import and dependency output as a build failure', () => {
    expect(interpretOutcome(outcome({ stderr: 'SyntaxError: invalid syntax' }), 1).buildSucceeded).toBe(false);
    expect(interpretOutcome(outcome({ stderr: "ModuleNotFoundError: No module named 'x'" }), 1).phase).toBe('build');
    expect(interpretOutcome(outcome({ stdout: 'FAILED tests/test_calc.py::test_add' }), 1).phase).toBe('test');
  });

  it('prefixes a collaborator timeout with the marker', () => {
    const result = interpretOutcome(outcome({ timedOut: true, stderr: 'killed', phase: 'test' }), 1);
    expect(result).toMatchObject({ buildSucceeded: true, testsPassed: false, timedOut: true });
    expect(result.stderr).toBe('[timeout] test phase exceeded its time limit\nkilled');
  });
});

describe('ShellBuildRunner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function commandResult(command: string, exitCode: number, stderr = ''): CommandResult {
    return { command, exitCode, stdout: `ran ${command}`, stderr, duration: 1, timedOut: false, cancelled: false };
  }

  const descriptor = buildSandboxDescriptor({
    language: 'go',
    manifestText: '',
    files: ['main.go'],
    contextDegraded: false,
  });

  it('expands the template once per phase', async () => {
    const execute = vi
      .spyOn(CommandRunner, 'execute')
      .mockImplementation(async command => commandResult(command, 0));
    const runner = new ShellBuildRunner('run {image} in {workspace}: "{command}"');

    const result = await runner.buildAndTest({
      workspace: '/tmp/ws',
      descriptor,
      timeoutMs: 1000,
      signal: new AbortController().signal,
    });

    expect(execute.mock.calls.map(call => call[0])).toEqual([
      'run golang:1.22-alpine in /tmp/ws: "go mod download && go build ./..."',
      'run golang:1.22-alpine in /tmp/ws: "go test ./..."',
    ]);
    expect(result.exitCode).toBe(0);
    expect(result.phase).toBeUndefined();
  });

  it('exports the workspace and phase to the template shell', async () => {
    const execute = vi
      .spyOn(CommandRunner, 'execute')
      .mockImplementation(async command => commandResult(command, 0));
    const runner = new ShellBuildRunner('{command}');

    await runner.buildAndTest({
      workspace: '/tmp/ws',
      descriptor,
      timeoutMs: 1000,
      signal: new AbortController().signal,
    });

    expect(execute.mock.calls.map(call => call[1].env)).toEqual([
      {
        REPAIRGATE_PHASE: 'build',
        REPAIRGATE_WORKSPACE: '/tmp/ws',
        REPAIRGATE_IMAGE: 'golang:1.22-alpine',
        REPAIRGATE_LANGUAGE: 'go',
      },
      {
        REPAIRGATE_PHASE: 'test',
        REPAIRGATE_WORKSPACE: '/tmp/ws',
        REPAIRGATE_IMAGE: 'golang:1.22-alpine',
        REPAIRGATE_LANGUAGE: 'go',
      },
    ]);
  });

  it('stops after a failed build and reports the phase', async () => {
    const execute = vi
      .spyOn(CommandRunner, 'execute')
      .mockImplementation(async command => commandResult(command, 2, 'undefined: foo'));
    const runner = new ShellBuildRunner('{command}');

    const result = await runner.buildAndTest({
      workspace: '/tmp/ws',
      descriptor,
      timeoutMs: 1000,
      signal: new AbortController().signal,
    });

    expect(execute).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ exitCode: 2, stderr: 'undefined: foo', phase: 'build' });
  });

  it('escapes the command for a double-quoted template', () => {
    expect(expandCommandTemplate('sh -c "{command}"', { workspace: '/w', image: 'i', command: 'echo "$HOME"' })).toBe(
      'sh -c "echo \\"\\$HOME\\""'
    );
  });
});
