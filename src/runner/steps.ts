import type {
  AutomationStep,
  ClickIf,
  InvalidStep,
  Selector,
} from '../types/index.js';
import type { DispatchableStep } from '../probes/library.js';

type Target = Selector | string;

export interface StepOptions {
  label?: string;
  retries?: number;
}

function locatorOf(target: Target): string {
  return typeof target === 'string' ? target : target.locator;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function invalid(label: string, reason: string, selector?: string): InvalidStep {
  return isBlank(selector) ? { kind: 'invalid', label, reason } : { kind: 'invalid', label, reason, selector };
}

export function clickWhenVisible(target: Target, timeoutMs: number, options: StepOptions = {}): AutomationStep {
  const selector = locatorOf(target);
  const label = options.label ?? `Click ${selector}`;
  return asValidated({ kind: 'clickWhenVisible', label, selector, timeoutMs, retries: options.retries });
}

export function typeText(target: Target, payload: string, timeoutMs: number, options: StepOptions = {}): AutomationStep {
  const selector = locatorOf(target);
  const label = options.label ?? `Type into ${selector}`;
  return asValidated({ kind: 'typeText', label, selector, payload, timeoutMs, retries: options.retries });
}

/** Uses `target.matchText` when `text` is omitted. */
export function clickMatchingText(
  target: Target,
  timeoutMs: number,
  options: StepOptions & { text?: string } = {},
): AutomationStep {
  const selector = locatorOf(target);
  const text = options.text ?? (typeof target === 'string' ? '' : target.matchText ?? '');
  const label = options.label ?? `Click ${selector} with text "${text}"`;
  return asValidated({ kind: 'clickMatchingText', label, selector, text, timeoutMs, retries: options.retries });
}

/** Uses `target.stateClass` when `stateClass` is omitted. */
export function conditionalClick(
  target: Target,
  clickIf: ClickIf,
  options: StepOptions & { stateClass?: string } = {},
): AutomationStep {
  const selector = locatorOf(target);
  const stateClass = options.stateClass ?? (typeof target === 'string' ? '' : target.stateClass ?? '');
  const label = options.label ?? `Click ${selector} if ${clickIf}`;
  return asValidated({ kind: 'conditionalClick', label, selector, stateClass, clickIf, retries: options.retries });
}

export function waitForDisappear(target: Target, timeoutMs: number, options: StepOptions = {}): AutomationStep {
  const selector = locatorOf(target);
  const label = options.label ?? `Wait for ${selector} to disappear`;
  return asValidated({ kind: 'waitForDisappear', label, selector, timeoutMs, retries: options.retries });
}

export function extractStableText(
  target: Target,
  masterTimeoutMs: number,
  stabilityDelayMs: number,
  options: StepOptions = {},
): AutomationStep {
  const selector = locatorOf(target);
  const label = options.label ?? `Extract text of ${selector}`;
  return asValidated({
    kind: 'extractStableText',
    label,
    selector,
    masterTimeoutMs,
    stabilityDelayMs,
    retries: options.retries,
  });
}

function asValidated(step: DispatchableStep): AutomationStep {
  const reason = validateStep(step);
  return reason === null ? step : invalid(step.label, reason, step.selector);
}

function checkTimeout(name: string, value: number): string | null {
  return Number.isFinite(value) && value > 0 ? null : `${name} must be a positive number, got ${value}`;
}

/**
 * Return why a step cannot be dispatched, or null when it can. Builders call
 * this when the step is made; the controller calls it again before dispatch
 * for steps assembled by hand.
 */
export function validateStep(step: AutomationStep): string | null {
  if (step.kind === 'invalid') return step.reason;
  if (isBlank(step.selector)) return `Empty selector for "${step.label}"`;
  if (step.retries !== undefined && (!Number.isInteger(step.retries) || step.retries < 0)) {
    return `retries must be a non-negative integer for "${step.label}"`;
  }

  switch (step.kind) {
    case 'clickWhenVisible':
    case 'waitForDisappear':
      return checkTimeout('timeoutMs', step.timeoutMs);
    case 'typeText':
      if (step.payload.length === 0) return `Empty payload for "${step.label}"`;
      return checkTimeout('timeoutMs', step.timeoutMs);
    case 'clickMatchingText':
      if (isBlank(step.text)) return `Empty match text for "${step.label}"`;
      return checkTimeout('timeoutMs', step.timeoutMs);
    case 'conditionalClick':
      if (isBlank(step.stateClass)) return `Empty state class for "${step.label}"`;
      if (!/^-?[A-Za-z_][\w-]*$/.test(step.stateClass)) {
        return `State class "${step.stateClass}" is not a plain class name for "${step.label}"`;
      }
      if (step.clickIf !== 'checked' && step.clickIf !== 'unchecked') {
        return `Invalid click condition "${String(step.clickIf)}" for "${step.label}"`;
      }
      return null;
    case 'extractStableText':
      return checkTimeout('masterTimeoutMs', step.masterTimeoutMs) ?? checkTimeout('stabilityDelayMs', step.stabilityDelayMs);
  }
}

export function isDispatchable(step: AutomationStep): step is DispatchableStep {
  return step.kind !== 'invalid' && validateStep(step) === null;
}
