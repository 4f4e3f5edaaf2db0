export type OutcomeStatus = 'success' | 'timeout' | 'error';

export interface StepOutcome {
  requestId: string;
  status: OutcomeStatus;
  selector: string;
  message: string;
  result?: string;
}

export type FailureKind =
  | 'ConstructionError'
  | 'Timeout'
  | 'RemoteExecutionError'
  | 'ProtocolError';

export interface SelectorMatch {
  tagName: string;
  id: string;
  className: string;
  text: string;
}

export type SelectorTestResult = { count: number; found: SelectorMatch[] } | { error: string };
