import { createHash } from 'node:crypto';
import type { ErrorReport } from '@repairgate/shared-types';

function normalizeMessage(message: string): string {
  return message
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[0-9]+/g, '#')
    .trim();
}

/**
 * Line that names the failure: the first `XxxError:`-style line, else the last non-empty line.
 */
export function errorHeadline(raw: string): string {
  const lines = raw
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
  const named = lines.find(line => /\b\w*(Error|Exception)\b.*:/.test(line));
  return named ?? lines[lines.length - 1] ?? '';
}

export function createErrorFingerprint(report: ErrorReport): string {
  if (!report.raw.trim()) {
    return 'none';
  }

  const key = [
    report.category,
    normalizeMessage(errorHeadline(report.raw)),
    ...report.referencedPaths.slice(0, 4),
  ].join('|');

  return createHash('sha1').update(key).digest('hex').slice(0, 12);
}
