/**
 * Container collaborator - isolated build + test of a workspace
 */

import { createLogger } from '../logging/log';
import type { SandboxDescriptor } from '../mre/sandbox-descriptor';
import { CommandRunner, type CommandResult } from './command-runner';

const log = createLogger('container');

export interface BuildTestRequest {
  /** Absolute path of the patched workspace copy */
  workspace: string;
  descriptor: SandboxDescriptor;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface BuildTestOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut?: boolean;
  /** Step that failed, when the collaborator can tell */
  phase?: 'build' | 'test';
}

/**
 * Runs one isolated build + test cycle. Implementations may be Docker, a
 * remote sandbox or an in-process double.
 */
export interface ContainerRunner {
  buildAndTest(request: BuildTestRequest): Promise<BuildTestOutcome>;
}

/**
 * Quote for use inside a double-quoted shell string
 */
function escapeDoubleQuoted(value: string): string {
  return value.replace(/(["\\$`])/g, '\\$1');
}

export function expandCommandTemplate(
  template: string,
  values: { workspace: string; image: string; command: string }
): string {
  return template
    .split('{workspace}')
    .join(values.workspace)
    .split('{image}')
    .join(values.image)
    .split('{command}')
    .join(escapeDoubleQuoted(values.command));
}

/**
 * Variables exported to the template's shell, for templates that prefer
 * `$REPAIRGATE_WORKSPACE` over placeholders
 */
export function sandboxEnvironment(phase: 'build' | 'test', request: BuildTestRequest): Record<string, string> {
  return {
    REPAIRGATE_PHASE: phase,
    REPAIRGATE_WORKSPACE: request.workspace,
    REPAIRGATE_IMAGE: request.descriptor.image,
    REPAIRGATE_LANGUAGE: request.descriptor.language,
  };
}

function joinCommands(...commands: string[]): string {
  return commands.filter(command => command.trim()).join(' && ');
}

/**
 * Default collaborator: expands a shell template (docker run by default) once
 * for the build phase (install + build) and once for the test phase.
 */
export class ShellBuildRunner implements ContainerRunner {
  constructor(private readonly commandTemplate: string) {}

  async buildAndTest(request: BuildTestRequest): Promise<BuildTestOutcome> {
    const started = Date.now();
    const { descriptor } = request;
    const remaining = () => Math.max(1, request.timeoutMs - (Date.now() - started));

    const buildCommand = joinCommands(descriptor.installCommand, descriptor.buildCommand);
    let buildOutput: CommandResult | null = null;
    if (buildCommand) {
      buildOutput = await this.run('build', buildCommand, request, remaining());
      if (buildOutput.exitCode !== 0 || buildOutput.timedOut || buildOutput.cancelled) {
        return this.outcome('build', [buildOutput], started);
      }
    }

    if (!descriptor.testCommand.trim()) {
      return {
        exitCode: 1,
        stdout: buildOutput?.stdout ?? '',
        stderr: `No test command configured for language '${descriptor.language}'`,
        durationMs: Date.now() - started,
        phase: 'test',
      };
    }

    const testOutput = await this.run('test', descriptor.testCommand, request, remaining());
    const outputs = buildOutput ? [buildOutput, testOutput] : [testOutput];
    if (testOutput.exitCode !== 0 || testOutput.timedOut || testOutput.cancelled) {
      return this.outcome('test', outputs, started);
    }
    return { ...this.outcome('test', outputs, started), exitCode: 0, phase: undefined };
  }

  private run(
    phase: 'build' | 'test',
    command: string,
    request: BuildTestRequest,
    timeout: number
  ): Promise<CommandResult> {
    const shellCommand = expandCommandTemplate(this.commandTemplate, {
      workspace: request.workspace,
      image: request.descriptor.image,
      command,
    });
    log.info('Running sandbox phase', { phase, command, image: request.descriptor.image });
    return CommandRunner.execute(shellCommand, {
      cwd: request.workspace,
      timeout,
      env: sandboxEnvironment(phase, request),
      signal: request.signal,
    });
  }

  private outcome(phase: 'build' | 'test', outputs: CommandResult[], started: number): BuildTestOutcome {
    const last = outputs[outputs.length - 1];
    return {
      exitCode: last ? last.exitCode : 1,
      stdout: outputs.map(output => output.stdout).join('\n').trim(),
      stderr: outputs.map(output => output.stderr).join('\n').trim(),
      durationMs: Date.now() - started,
      timedOut: outputs.some(output => output.timedOut),
      phase,
    };
  }
}
