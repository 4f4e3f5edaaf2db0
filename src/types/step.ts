export type ClickIf = 'checked' | 'unchecked';

interface StepBase {
  label: string;
  /** Extra attempts after a timeout or remote error. Defaults to 0. */
  retries?: number;
}

export interface ClickWhenVisibleStep extends StepBase {
  kind: 'clickWhenVisible';
  selector: string;
  timeoutMs: number;
}

export interface TypeTextStep extends StepBase {
  kind: 'typeText';
  selector: string;
  payload: string;
  timeoutMs: number;
}

export interface ClickMatchingTextStep extends StepBase {
  kind: 'clickMatchingText';
  selector: string;
  text: string;
  timeoutMs: number;
}

export interface ConditionalClickStep extends StepBase {
  kind: 'conditionalClick';
  selector: string;
  stateClass: string;
  clickIf: ClickIf;
}

export interface WaitForDisappearStep extends StepBase {
  kind: 'waitForDisappear';
  selector: string;
  timeoutMs: number;
}

export interface ExtractStableTextStep extends StepBase {
  kind: 'extractStableText';
  selector: string;
  masterTimeoutMs: number;
  stabilityDelayMs: number;
}

export interface InvalidStep extends StepBase {
  kind: 'invalid';
  reason: string;
  /** The locator of the step that failed validation, when it had one. */
  selector?: string;
}

export type AutomationStep =
  | ClickWhenVisibleStep
  | TypeTextStep
  | ClickMatchingTextStep
  | ConditionalClickStep
  | WaitForDisappearStep
  | ExtractStableTextStep
  | InvalidStep;

export type StepKind = AutomationStep['kind'];
