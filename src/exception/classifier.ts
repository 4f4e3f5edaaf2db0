import type { FailureKind, OutcomeStatus, SequenceFailure } from '../types/index.js';

type FailureSource =
  | { source: 'construction' }
  | { source: 'protocol' }
  | { source: 'outcome'; status: Exclude<OutcomeStatus, 'success'> };

export function classifyFailure(failure: FailureSource): FailureKind {
  switch (failure.source) {
    case 'construction':
      return 'ConstructionError';
    case 'protocol':
      return 'ProtocolError';
    case 'outcome':
      return failure.status === 'timeout' ? 'Timeout' : 'RemoteExecutionError';
  }
}

/** Only remote timeouts and remote errors are worth another attempt. */
export function isRetryable(kind: FailureKind): boolean {
  return kind === 'Timeout' || kind === 'RemoteExecutionError';
}

export function formatFailure(failure: SequenceFailure): string {
  const position = `${failure.stepIndex + 1}/${failure.stepCount}`;
  const target = failure.selector ? ` [${failure.selector}]` : '';
  return `Sequence "${failure.sequence}" failed at step ${position} (${failure.label})${target}: ${failure.kind}: ${failure.message}`;
}
