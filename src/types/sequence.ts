import type { AutomationStep, StepKind } from './step.js';
import type { FailureKind, OutcomeStatus } from './outcome.js';

export interface Sequence {
  name: string;
  steps: AutomationStep[];
}

export type BridgeState = 'disconnected' | 'handshakeInFlight' | 'ready';

export type ControllerState =
  | { phase: 'idle' }
  | { phase: 'running'; sequence: string; stepIndex: number }
  | { phase: 'completed'; sequence: string }
  | { phase: 'extracted'; sequence: string }
  | { phase: 'failed'; sequence: string; message: string }
  | { phase: 'disposed' };

export type StartDisposition = 'started' | 'deferred' | 'replaced' | 'rejected';

export interface StepRecord {
  sequence: string;
  stepIndex: number;
  stepCount: number;
  label: string;
  kind: StepKind;
  requestId: string | null;
  status: OutcomeStatus;
  message: string;
  attempt: number;
  durationMs: number;
}

export interface SequenceFailure {
  kind: FailureKind;
  sequence: string;
  stepIndex: number;
  stepCount: number;
  label: string;
  selector: string;
  message: string;
}
