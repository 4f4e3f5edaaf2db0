import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { StepRecord } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AutomationLogger {
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void;
  logStep(record: StepRecord): void;
}

export const silentLogger: AutomationLogger = {
  log() {},
  logStep() {},
};

/**
 * Appends JSONL entries to `<runDir>/logs.jsonl`. Writes are queued so entries
 * keep their order; `flush()` waits for the queue and rethrows the first
 * write failure.
 */
export class RunLogger implements AutomationLogger {
  private logPath: string;
  private initialized = false;
  private queue: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(
    private runDir: string,
    private options: { debug: boolean } = { debug: false },
  ) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
    if (level === 'debug' && !this.options.debug) return;
    this.enqueue({ timestamp: new Date().toISOString(), level, event, ...fields });
  }

  logStep(record: StepRecord): void {
    this.enqueue({
      timestamp: new Date().toISOString(),
      level: record.status === 'success' ? 'info' : 'error',
      event: 'step_resolved',
      ...record,
    });
  }

  async flush(): Promise<void> {
    await this.queue;
    if (this.failure !== null) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }

  getRunDir(): string {
    return this.runDir;
  }

  getLogPath(): string {
    return this.logPath;
  }

  private enqueue(entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    this.queue = this.queue
      .then(() => this.write(line))
      .catch((error: unknown) => {
        if (this.failure === null) this.failure = error;
      });
  }

  private async write(line: string): Promise<void> {
    if (!this.initialized) {
      await mkdir(this.runDir, { recursive: true });
      this.initialized = true;
    }
    await appendFile(this.logPath, line, 'utf-8');
  }
}
