import type { ClickIf, StepOutcome } from '../types/index.js';

/** Global names shared by the host bridge and the injected runtime. */
export const REPORT_BINDING = '__reportStepOutcome';
export const READY_BINDING = '__confirmBridgeReadiness';
export const RUNTIME_GLOBAL = '__automationProbes';

export type ProbeAction = { kind: 'click' } | { kind: 'setValue'; value: string };

export interface ProbeRequest {
  requestId: string;
  locator: string;
}

export interface AppearRequest extends ProbeRequest {
  timeoutMs: number;
  action: ProbeAction | null;
}

export type DisappearRequest = AppearRequest;

export interface TextMatchRequest extends ProbeRequest {
  text: string;
  timeoutMs: number;
  action: ProbeAction | null;
}

export interface ConditionalRequest extends ProbeRequest {
  stateClass: string;
  clickIf: ClickIf;
  action: ProbeAction;
}

export interface ExtractRequest extends ProbeRequest {
  masterTimeoutMs: number;
  stabilityDelayMs: number;
  pollIntervalMs: number;
}

export interface ProbeRuntime {
  findInAnyContext(locator: string): Element | null;
  findAllInAnyContext(locator: string): Element[];
  waitForAppear(request: AppearRequest): void;
  waitForDisappear(request: DisappearRequest): void;
  waitForTextMatch(request: TextMatchRequest): void;
  conditionalAction(request: ConditionalRequest): void;
  extractStableText(request: ExtractRequest): void;
  cancel(requestId: string): boolean;
  cancelAll(): number;
  pending(): string[];
}

export type ProbeMethod = Exclude<
  keyof ProbeRuntime,
  'findInAnyContext' | 'findAllInAnyContext' | 'cancel' | 'cancelAll' | 'pending'
>;

export type ProbeReporter = (outcome: StepOutcome) => void;

/**
 * What the runtime needs from the page. In the browser this is `window`;
 * tests hand in a jsdom document with their own timers.
 */
export interface ProbeScope {
  document: Document;
  MutationObserver: new (callback: MutationCallback) => MutationObserver;
  setTimeout(handler: () => void, timeout: number): number;
  clearTimeout(handle: number): void;
  setInterval(handler: () => void, timeout: number): number;
  clearInterval(handle: number): void;
}

export interface ProbeRuntimeOptions {
  debug: boolean;
}
