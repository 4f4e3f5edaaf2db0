#!/usr/bin/env node
/**
 * CLI: drive a notebook from stdin JSON → JSONL events on stdout.
 *
 * Usage:
 *   echo '{"mode":"run","transcript":"...","prompt":"..."}' | notebook-pilot
 *   echo '{"mode":"test-selector","locator":"textarea"}' | notebook-pilot
 *
 * Opens the notebook in a persistent Chromium profile (so a signed-in session
 * survives between runs), installs the bridge before navigating, and reports
 * every resolved step as it happens. A run writes `logs.jsonl` and
 * `summary.md` under `<runDir>/<runId>/`.
 */

import { chromium } from 'playwright';
import type { BrowserContext } from 'playwright';
import { join } from 'node:path';
import { z } from 'zod';

import { loadAutomationConfig } from '../config/loader.js';
import { loadSelectorCatalog } from '../catalog/loader.js';
import { PlaywrightRemoteContext } from '../bridge/playwright-context.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import type { RunOutcome } from '../logging/summary-writer.js';
import { NotebookWorkflow } from '../workflow/notebook-workflow.js';
import type { AutomationConfig, StepRecord } from '../types/index.js';

// ── input ──────────────────────────────────────────

const CliOptionsSchema = z
  .object({
    config: z.string().min(1).optional(),
    url: z.string().url().optional(),
    headless: z.boolean().optional(),
    debug: z.boolean().optional(),
    timeout: z.number().int().positive().optional(),
  })
  .default({});

const CliInputSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('run'),
    transcript: z.string().min(1),
    prompt: z.string().min(1),
    options: CliOptionsSchema,
  }),
  z.object({
    mode: z.literal('test-selector'),
    locator: z.string().min(1),
    options: CliOptionsSchema,
  }),
]);

type CliInput = z.infer<typeof CliInputSchema>;
type CliOptions = z.infer<typeof CliOptionsSchema>;

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseInput(raw: string): CliInput | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    emit({ type: 'run_error', error: 'Invalid JSON on stdin' });
    return null;
  }
  const parsed = CliInputSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    emit({ type: 'run_error', error: `Invalid input: ${issues.join('; ')}` });
    return null;
  }
  return parsed.data;
}

async function openPage(context: BrowserContext) {
  return context.pages()[0] ?? (await context.newPage());
}

/** Resolves with `onTimeout()` after `ms`, unless cancelled first. */
function deadline<T>(ms: number, onTimeout: () => T): { promise: Promise<T>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

// ── modes ──────────────────────────────────────────

async function runWorkflow(
  input: Extract<CliInput, { mode: 'run' }>,
  config: AutomationConfig,
  browser: BrowserContext,
  timeoutMs: number,
): Promise<boolean> {
  const runId = `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
  const runDir = join(config.runDir, runId);
  const startedAt = new Date().toISOString();
  const logger = new RunLogger(runDir, { debug: config.debug });
  const catalog = await loadSelectorCatalog(config.selectorsPath);
  const records: StepRecord[] = [];

  emit({ type: 'run_start', runId, runDir, url: config.url });

  let settle: (outcome: RunOutcome) => void = () => {};
  const finished = new Promise<RunOutcome>((resolve) => {
    settle = resolve;
  });

  const page = await openPage(browser);
  const workflow = new NotebookWorkflow({
    context: new PlaywrightRemoteContext(page),
    catalog,
    config,
    logger,
    callbacks: {
      onStepResolved: (record) => {
        records.push(record);
        emit({ type: 'step_end', ...record });
      },
      onBridgeReady: () => emit({ type: 'bridge_ready' }),
      onSequenceFinished: (sequence) => settle({ kind: 'finished', sequence }),
      onSequenceFailed: (message) => settle({ kind: 'failed', message }),
      onTextExtracted: (text, sequence) => settle({ kind: 'extracted', sequence, text }),
    },
  });

  await workflow.attach();
  const disposition = workflow.submitTranscript(input.transcript, input.prompt);
  emit({ type: 'sequence_submitted', disposition });

  const limit = deadline<RunOutcome>(timeoutMs, () => ({
    kind: 'aborted',
    reason: `Run timed out after ${timeoutMs}ms`,
  }));
  const runStart = Date.now();
  let outcome: RunOutcome;
  try {
    await page.goto(config.url);
    outcome = await Promise.race([finished, limit.promise]);
  } catch (err) {
    outcome = { kind: 'aborted', reason: messageOf(err) };
  } finally {
    limit.cancel();
  }

  await workflow.dispose();
  const totalDurationMs = Date.now() - runStart;
  logger.log(outcome.kind === 'extracted' || outcome.kind === 'finished' ? 'info' : 'error', 'run_complete', {
    outcome: outcome.kind,
    totalDurationMs,
  });
  await logger.flush();
  await writeSummary({
    runDir,
    info: { runId, startedAt, url: config.url },
    records,
    outcome,
    durationMs: totalDurationMs,
  });

  switch (outcome.kind) {
    case 'extracted':
      emit({ type: 'run_complete', ok: true, totalDurationMs, sequence: outcome.sequence, text: outcome.text });
      return true;
    case 'finished':
      emit({ type: 'run_complete', ok: true, totalDurationMs, sequence: outcome.sequence });
      return true;
    case 'failed':
      emit({ type: 'run_complete', ok: false, totalDurationMs, error: outcome.message });
      return false;
    case 'aborted':
      emit({ type: 'run_error', error: outcome.reason });
      return false;
  }
}

async function testSelector(
  locator: string,
  config: AutomationConfig,
  browser: BrowserContext,
  timeoutMs: number,
): Promise<boolean> {
  let signalReady: () => void = () => {};
  const ready = new Promise<'ready'>((resolve) => {
    signalReady = () => resolve('ready');
  });

  const page = await openPage(browser);
  const workflow = new NotebookWorkflow({
    context: new PlaywrightRemoteContext(page),
    catalog: await loadSelectorCatalog(config.selectorsPath),
    config,
    callbacks: {
      onBridgeReady: () => signalReady(),
      onSequenceFinished: () => {},
      onSequenceFailed: () => {},
      onTextExtracted: () => {},
    },
  });

  await workflow.attach();
  const limit = deadline(timeoutMs, () => 'timeout' as const);
  try {
    await page.goto(config.url);
    if ((await Promise.race([ready, limit.promise])) === 'timeout') {
      emit({ type: 'run_error', error: `Bridge not ready after ${timeoutMs}ms` });
      return false;
    }
    const result = await workflow.testSelector(locator);
    emit({ type: 'selector_result', locator, ...result });
    return !('error' in result);
  } finally {
    limit.cancel();
    await workflow.dispose();
  }
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const input = parseInput(await readStdin());
  if (!input) {
    process.exitCode = 1;
    return;
  }

  const options: CliOptions = input.options;
  const config = await loadAutomationConfig(options.config, {
    url: options.url,
    headless: options.headless,
    debug: options.debug,
  });
  const timeoutMs = options.timeout ?? config.timeouts.runMs;

  let browser: BrowserContext;
  try {
    browser = await chromium.launchPersistentContext(config.profileDir, { headless: config.headless });
  } catch (err) {
    emit({ type: 'run_error', error: `Browser launch failed: ${messageOf(err)}` });
    process.exitCode = 1;
    return;
  }

  try {
    const ok =
      input.mode === 'run'
        ? await runWorkflow(input, config, browser, timeoutMs)
        : await testSelector(input.locator, config, browser, timeoutMs);
    if (!ok) process.exitCode = 1;
  } catch (err) {
    emit({ type: 'run_error', error: messageOf(err) });
    process.exitCode = 1;
  } finally {
    await browser.close().catch((err: unknown) => {
      process.stderr.write(`Failed to close browser: ${messageOf(err)}\n`);
    });
  }
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: messageOf(err) });
  process.exitCode = 1;
});
