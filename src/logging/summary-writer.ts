import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { StepRecord } from '../types/index.js';

export type RunOutcome =
  | { kind: 'extracted'; sequence: string; text: string }
  | { kind: 'finished'; sequence: string }
  | { kind: 'failed'; message: string }
  | { kind: 'aborted'; reason: string };

export interface RunInfo {
  runId: string;
  startedAt: string;
  url: string;
}

export interface SummaryOptions {
  runDir: string;
  info: RunInfo;
  records: StepRecord[];
  outcome: RunOutcome;
  durationMs: number;
}

/**
 * Write a human-readable markdown summary of one run to `summary.md`.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  const md = buildSummaryMarkdown(options.info, options.records, options.outcome, options.durationMs);
  await writeFile(join(options.runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(
  info: RunInfo,
  records: StepRecord[],
  outcome: RunOutcome,
  durationMs: number,
): string {
  const passed = records.filter((r) => r.status === 'success').length;
  const retried = records.filter((r) => r.attempt > 0).length;

  const lines: string[] = [
    '# Run Summary',
    `- Target: ${info.url}`,
    `- Result: ${describeOutcome(outcome)}`,
    `- Duration: ${formatDuration(durationMs)}`,
    `- Steps: ${passed}/${records.length} passed`,
  ];
  if (retried > 0) {
    lines.push(`- Retried attempts: ${retried}`);
  }

  lines.push('');
  lines.push('## Steps');
  if (records.length === 0) {
    lines.push('- No steps resolved');
  }
  for (const record of records) {
    const attempt = record.attempt > 0 ? ` (attempt ${record.attempt + 1})` : '';
    lines.push(
      `- [${record.status}] ${record.sequence} ${record.stepIndex + 1}/${record.stepCount} ${record.label}${attempt} - ${record.message}`,
    );
  }

  if (outcome.kind === 'failed') {
    lines.push('');
    lines.push('## Failure');
    lines.push(outcome.message);
  }

  if (outcome.kind === 'extracted') {
    lines.push('');
    lines.push('## Extracted Text');
    lines.push(`- Length: ${outcome.text.length} chars`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${info.runId}`);
  lines.push(`- Started at: ${info.startedAt}`);

  return lines.join('\n') + '\n';
}

function describeOutcome(outcome: RunOutcome): string {
  switch (outcome.kind) {
    case 'extracted':
      return `Text extracted (${outcome.sequence})`;
    case 'finished':
      return `Finished (${outcome.sequence})`;
    case 'failed':
      return 'Failed';
    case 'aborted':
      return `Aborted: ${outcome.reason}`;
  }
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
