/**
 * Ticket Store - per-ticket audit directory
 *
 * Layout under `<artifactsDir>/<ticketId>/`:
 *   ticket.json, metrics.json, decision.json
 *   attempts/<NN>/prompt.md, response.txt, attempt.json
 *   final.patch, final-files.json
 *   report.json, report.md
 *
 * Every file is created with the `wx` flag: artifacts are never overwritten.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type {
  DecisionResult,
  FixAttempt,
  ProposedPatch,
  RepairMetrics,
  RepairReport,
  RepairTicket,
} from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { resolvePathWithinBase } from '../security/path-safety';

const log = createLogger('ticket-store');

export function attemptDirName(index: number): string {
  return String(index).padStart(2, '0');
}

export class TicketStore {
  constructor(readonly artifactsDir: string) {}

  ticketDir(ticketId: string): string {
    return resolvePathWithinBase(this.artifactsDir, ticketId);
  }

  /**
   * Create the ticket directory. Fails if it already exists.
   */
  async createTicket(ticket: RepairTicket): Promise<string> {
    await fs.mkdir(this.artifactsDir, { recursive: true });
    const dir = this.ticketDir(ticket.ticketId);
    await fs.mkdir(dir);
    await this.writeNew(ticket.ticketId, 'ticket.json', toJson(ticket));
    log.debug('Ticket directory created', { dir });
    return dir;
  }

  async writeMetrics(ticketId: string, metrics: RepairMetrics): Promise<void> {
    await this.writeNew(ticketId, 'metrics.json', toJson(metrics));
  }

  async writeDecision(ticketId: string, decision: DecisionResult): Promise<void> {
    await this.writeNew(ticketId, 'decision.json', toJson(decision));
  }

  async writeAttempt(ticketId: string, attempt: FixAttempt): Promise<void> {
    const dir = `attempts/${attemptDirName(attempt.index)}`;
    await this.writeNew(ticketId, `${dir}/prompt.md`, attempt.prompt);
    if (attempt.response !== null) {
      await this.writeNew(ticketId, `${dir}/response.txt`, attempt.response);
    }
    const { prompt: _prompt, response: _response, ...record } = attempt;
    await this.writeNew(ticketId, `${dir}/attempt.json`, toJson(record));
  }

  async writeFinalPatch(ticketId: string, patch: ProposedPatch): Promise<void> {
    await this.writeNew(ticketId, 'final.patch', patch.diff);
    if (Object.keys(patch.files).length > 0) {
      await this.writeNew(ticketId, 'final-files.json', toJson(patch.files));
    }
  }

  async writeReport(ticketId: string, report: RepairReport, markdown: string): Promise<void> {
    await this.writeNew(ticketId, 'report.json', toJson(report));
    await this.writeNew(ticketId, 'report.md', markdown);
  }

  private async writeNew(ticketId: string, relativePath: string, content: string): Promise<void> {
    const target = resolvePathWithinBase(this.ticketDir(ticketId), relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, { encoding: 'utf-8', flag: 'wx' });
  }
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
