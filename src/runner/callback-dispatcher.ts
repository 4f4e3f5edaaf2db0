import type { StepOutcome } from '../types/index.js';
import { StepOutcomeSchema } from '../schemas/index.js';
import type { AutomationLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';

export interface OutcomeTarget {
  /** Correlation id of the step in flight, or null when nothing is awaited. */
  awaitedRequestId(): string | null;
  resolveStep(outcome: StepOutcome): void;
  failAwaitedStep(message: string): void;
}

/**
 * Single entry point for every outcome the remote runtime reports. Outcomes
 * are matched by request id, never by selector: several steps may share one.
 */
export class CallbackDispatcher {
  constructor(
    private target: OutcomeTarget,
    private logger: AutomationLogger = silentLogger,
  ) {}

  receive(payload: unknown): void {
    const awaited = this.target.awaitedRequestId();
    const parsed = StepOutcomeSchema.safeParse(payload);

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      const message = `Malformed step outcome (${issues})`;
      if (awaited === null) {
        this.logger.log('warn', 'outcome_malformed_unawaited', { message });
        return;
      }
      this.logger.log('error', 'outcome_malformed', { message, awaited });
      this.target.failAwaitedStep(message);
      return;
    }

    const outcome = parsed.data;
    if (outcome.requestId !== awaited) {
      this.logger.log('warn', 'outcome_stale', {
        requestId: outcome.requestId,
        awaited,
        status: outcome.status,
      });
      return;
    }

    this.logger.log('debug', 'outcome_received', {
      requestId: outcome.requestId,
      status: outcome.status,
      selector: outcome.selector,
      message: outcome.message,
    });
    this.target.resolveStep(outcome);
  }
}
