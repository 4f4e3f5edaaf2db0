import { randomUUID } from 'node:crypto';
import type {
  AutomationStep,
  BridgeState,
  ControllerState,
  FailureKind,
  OutcomeStatus,
  SelectorTestResult,
  Sequence,
  SequenceFailure,
  StartDisposition,
  StepOutcome,
  StepRecord,
} from '../types/index.js';
import { Bridge } from '../bridge/bridge.js';
import type { RemoteContext } from '../bridge/remote-context.js';
import { ProbeLibrary } from '../probes/library.js';
import type { AutomationLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';
import { classifyFailure, formatFailure, isRetryable } from '../exception/classifier.js';
import { CallbackDispatcher } from './callback-dispatcher.js';
import type { OutcomeTarget } from './callback-dispatcher.js';
import { isDispatchable, validateStep } from './steps.js';

export interface SequenceCallbacks {
  onSequenceFinished(name: string): void;
  onSequenceFailed(message: string, failure: SequenceFailure): void;
  onTextExtracted(result: string, sequence: string): void;
  onStepResolved?(record: StepRecord): void;
  onBridgeReady?(): void;
}

/** Sequence name -> factory of the sequence that starts when it completes. */
export type ChainRules = Readonly<Record<string, () => Sequence>>;

export interface SequenceControllerOptions {
  context: RemoteContext;
  callbacks: SequenceCallbacks;
  probes?: ProbeLibrary;
  logger?: AutomationLogger;
  chains?: ChainRules;
  createRequestId?: () => string;
}

interface InFlight {
  requestId: string;
  attempt: number;
  startedAt: number;
}

interface ActiveRun {
  sequence: Sequence;
  stepIndex: number;
  inFlight: InFlight | null;
}

function selectorOf(step: AutomationStep): string {
  return step.kind === 'invalid' ? step.selector ?? '' : step.selector;
}

/**
 * Drives one automated window: holds the bridge, the running sequence and at
 * most one deferred sequence, and moves through the steps one outcome at a
 * time. Exactly one step is in flight while a sequence runs.
 */
export class SequenceController implements OutcomeTarget {
  private bridge: Bridge;
  private dispatcher: CallbackDispatcher;
  private probes: ProbeLibrary;
  private callbacks: SequenceCallbacks;
  private logger: AutomationLogger;
  private chains: Map<string, () => Sequence>;
  private createRequestId: () => string;

  private state: ControllerState = { phase: 'idle' };
  private run: ActiveRun | null = null;
  private pending: Sequence | null = null;

  constructor(options: SequenceControllerOptions) {
    this.probes = options.probes ?? new ProbeLibrary();
    this.callbacks = options.callbacks;
    this.logger = options.logger ?? silentLogger;
    this.chains = new Map(Object.entries(options.chains ?? {}));
    this.createRequestId = options.createRequestId ?? randomUUID;
    this.bridge = new Bridge(options.context, this.probes, this.logger);
    this.dispatcher = new CallbackDispatcher(this, this.logger);
  }

  async attach(): Promise<void> {
    await this.bridge.attach({
      onOutcome: (payload) => this.dispatcher.receive(payload),
      onReady: () => this.handleBridgeReady(),
    });
  }

  getState(): ControllerState {
    return this.state;
  }

  getBridgeState(): BridgeState {
    return this.bridge.getState();
  }

  getPendingSequence(): string | null {
    return this.pending?.name ?? null;
  }

  startSequence(name: string, steps: readonly AutomationStep[]): StartDisposition {
    return this.start({ name, steps: [...steps] });
  }

  start(sequence: Sequence): StartDisposition {
    if (this.state.phase === 'disposed') {
      this.logger.log('warn', 'sequence_rejected', { sequence: sequence.name, reason: 'disposed' });
      return 'rejected';
    }
    if (this.run) {
      this.logger.log('warn', 'sequence_rejected', {
        sequence: sequence.name,
        reason: 'busy',
        running: this.run.sequence.name,
      });
      return 'rejected';
    }
    if (!this.bridge.isReady()) {
      const previous = this.pending;
      this.pending = sequence;
      if (previous) {
        this.logger.log('warn', 'pending_sequence_replaced', { previous: previous.name, next: sequence.name });
        return 'replaced';
      }
      this.logger.log('info', 'sequence_deferred', { sequence: sequence.name, bridge: this.bridge.getState() });
      return 'deferred';
    }
    this.begin(sequence);
    return 'started';
  }

  async testSelector(locator: string): Promise<SelectorTestResult> {
    return this.bridge.testSelector(locator);
  }

  /** Stop everything this window started, including watchers in the page. */
  async dispose(): Promise<void> {
    if (this.state.phase === 'disposed') return;
    const running = this.run?.sequence.name ?? null;
    this.state = { phase: 'disposed' };
    this.run = null;
    this.pending = null;
    this.logger.log('info', 'controller_disposed', { running });

    if (!this.bridge.isReady()) return;
    try {
      const cancelled = await this.bridge.execute(this.probes.cancelAllScript());
      this.logger.log('debug', 'remote_watchers_cancelled', { cancelled });
    } catch (error) {
      this.logger.log('warn', 'remote_cancel_failed', { message: messageOf(error) });
    }
  }

  awaitedRequestId(): string | null {
    return this.run?.inFlight?.requestId ?? null;
  }

  resolveStep(outcome: StepOutcome): void {
    const run = this.run;
    if (!run || !run.inFlight || run.inFlight.requestId !== outcome.requestId) return;
    const step = run.sequence.steps[run.stepIndex];
    const { attempt } = run.inFlight;
    this.record(run, step, outcome.status, outcome.message);
    run.inFlight = null;

    if (outcome.status === 'success') {
      if (outcome.result !== undefined) {
        this.finishWithText(run, outcome.result);
        return;
      }
      this.advance(run);
      return;
    }

    const kind = classifyFailure({ source: 'outcome', status: outcome.status });
    if (isRetryable(kind) && attempt < (step.retries ?? 0)) {
      this.logger.log('warn', 'step_retry', {
        sequence: run.sequence.name,
        stepIndex: run.stepIndex,
        label: step.label,
        attempt: attempt + 1,
        message: outcome.message,
      });
      this.dispatch(run, attempt + 1);
      return;
    }

    const partial = outcome.result ? ` (last text observed: ${outcome.result.length} chars)` : '';
    this.fail(run, kind, outcome.selector || selectorOf(step), outcome.message + partial);
  }

  failAwaitedStep(message: string): void {
    const run = this.run;
    if (!run || !run.inFlight) return;
    const step = run.sequence.steps[run.stepIndex];
    const { requestId } = run.inFlight;
    this.record(run, step, 'error', message);
    run.inFlight = null;
    this.cancelRemote(requestId);
    this.fail(run, classifyFailure({ source: 'protocol' }), selectorOf(step), message);
  }

  private handleBridgeReady(): void {
    if (this.state.phase === 'disposed') return;
    this.callbacks.onBridgeReady?.();
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    this.logger.log('info', 'pending_sequence_started', { sequence: pending.name });
    this.begin(pending);
  }

  private begin(sequence: Sequence): void {
    this.logger.log('info', 'sequence_started', { sequence: sequence.name, steps: sequence.steps.length });
    const run: ActiveRun = { sequence, stepIndex: 0, inFlight: null };
    this.run = run;
    if (sequence.steps.length === 0) {
      this.complete(run);
      return;
    }
    this.dispatch(run, 0);
  }

  private advance(run: ActiveRun): void {
    run.stepIndex++;
    if (run.stepIndex < run.sequence.steps.length) {
      this.dispatch(run, 0);
    } else {
      this.complete(run);
    }
  }

  private dispatch(run: ActiveRun, attempt: number): void {
    const step = run.sequence.steps[run.stepIndex];
    this.state = { phase: 'running', sequence: run.sequence.name, stepIndex: run.stepIndex };

    if (!isDispatchable(step)) {
      const reason = validateStep(step) ?? 'Step cannot be dispatched';
      this.record(run, step, 'error', reason);
      this.fail(run, classifyFailure({ source: 'construction' }), selectorOf(step), reason);
      return;
    }

    const requestId = this.createRequestId();
    let script: string;
    try {
      script = this.probes.compile(step, requestId);
    } catch (error) {
      const reason = messageOf(error);
      this.record(run, step, 'error', reason);
      this.fail(run, classifyFailure({ source: 'construction' }), step.selector, reason);
      return;
    }

    // The outcome may arrive before execute() settles, so the id is awaited first.
    run.inFlight = { requestId, attempt, startedAt: Date.now() };
    this.logger.log('debug', 'step_dispatched', {
      sequence: run.sequence.name,
      stepIndex: run.stepIndex,
      label: step.label,
      requestId,
      attempt,
    });
    this.bridge.execute(script).catch((error: unknown) => this.handleExecuteError(requestId, error));
  }

  private handleExecuteError(requestId: string, error: unknown): void {
    if (this.awaitedRequestId() !== requestId) {
      this.logger.log('debug', 'late_probe_error_ignored', { requestId, message: messageOf(error) });
      return;
    }
    const run = this.run;
    const selector = run ? selectorOf(run.sequence.steps[run.stepIndex]) : '';
    this.resolveStep({
      requestId,
      status: 'error',
      selector,
      message: `Probe script failed: ${messageOf(error)}`,
    });
  }

  private complete(run: ActiveRun): void {
    const name = run.sequence.name;
    this.run = null;
    this.state = { phase: 'completed', sequence: name };
    this.logger.log('info', 'sequence_completed', { sequence: name });

    const chained = this.chains.get(name);
    if (chained) {
      const next = chained();
      this.logger.log('info', 'sequence_chained', { from: name, to: next.name });
      this.start(next);
      return;
    }
    this.callbacks.onSequenceFinished(name);
  }

  private finishWithText(run: ActiveRun, result: string): void {
    const name = run.sequence.name;
    this.run = null;
    this.state = { phase: 'extracted', sequence: name };
    this.logger.log('info', 'text_extracted', { sequence: name, length: result.length });
    this.callbacks.onTextExtracted(result, name);
  }

  private fail(run: ActiveRun, kind: FailureKind, selector: string, message: string): void {
    const step = run.sequence.steps[run.stepIndex];
    const failure: SequenceFailure = {
      kind,
      sequence: run.sequence.name,
      stepIndex: run.stepIndex,
      stepCount: run.sequence.steps.length,
      label: step.label,
      selector,
      message,
    };
    const formatted = formatFailure(failure);
    this.run = null;
    this.state = { phase: 'failed', sequence: run.sequence.name, message: formatted };
    this.logger.log('error', 'sequence_failed', { ...failure });
    this.callbacks.onSequenceFailed(formatted, failure);
  }

  private record(run: ActiveRun, step: AutomationStep, status: OutcomeStatus, message: string): void {
    const inFlight = run.inFlight;
    const record: StepRecord = {
      sequence: run.sequence.name,
      stepIndex: run.stepIndex,
      stepCount: run.sequence.steps.length,
      label: step.label,
      kind: step.kind,
      requestId: inFlight?.requestId ?? null,
      status,
      message,
      attempt: inFlight?.attempt ?? 0,
      durationMs: inFlight ? Date.now() - inFlight.startedAt : 0,
    };
    this.logger.logStep(record);
    this.callbacks.onStepResolved?.(record);
  }

  private cancelRemote(requestId: string): void {
    if (!this.bridge.isReady()) return;
    this.bridge.execute(this.probes.cancelScript(requestId)).then(
      (cancelled) => this.logger.log('debug', 'remote_watcher_cancelled', { requestId, cancelled }),
      (error: unknown) => this.logger.log('warn', 'remote_cancel_failed', { requestId, message: messageOf(error) }),
    );
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
