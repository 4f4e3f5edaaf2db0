import type {
  AppearRequest,
  ConditionalRequest,
  ExtractRequest,
  ProbeAction,
  ProbeReporter,
  ProbeRuntime,
  ProbeRuntimeOptions,
  ProbeScope,
  TextMatchRequest,
} from './protocol.js';
import type { OutcomeStatus } from '../types/index.js';

/**
 * Build the probe runtime inside the remote document.
 *
 * This function is serialized with `Function.prototype.toString` and evaluated
 * in the page, so it must stay self-contained: no imports at runtime, no
 * references to module scope, only its parameters and page globals.
 */
export function installProbeRuntime(
  scope: ProbeScope,
  report: ProbeReporter,
  options: ProbeRuntimeOptions,
): ProbeRuntime {
  interface Verdict {
    message: string;
    result?: string;
  }

  interface WaitControl {
    settle(status: OutcomeStatus, message: string, result?: string): void;
    defer(delayMs: number, task: () => void): number;
    clear(handle: number): void;
  }

  interface WaitSpec {
    requestId: string;
    locator: string;
    timeoutMs: number;
    /** `mutation` re-checks on DOM changes, `poll` on a fixed interval. */
    trigger: { kind: 'mutation'; characterData: boolean } | { kind: 'poll'; intervalMs: number };
    check(control: WaitControl): Verdict | null;
    onTimeout(): Verdict;
  }

  interface WaitCondition {
    start(): void;
    cancel(): void;
  }

  const active = new Map<string, WaitCondition>();

  const messageOf = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

  const debugLog = (message: string): void => {
    if (options.debug) console.log(`[probe] ${message}`);
  };

  const frameDocuments = (): Document[] => {
    const documents: Document[] = [];
    const frames = scope.document.querySelectorAll('iframe');
    for (const frame of Array.from(frames)) {
      try {
        const frameDocument = frame.contentDocument ?? frame.contentWindow?.document ?? null;
        if (frameDocument) documents.push(frameDocument);
      } catch (error) {
        // Cross-origin frames throw on access; they are skipped.
        debugLog(`cannot access iframe: ${messageOf(error)}`);
      }
    }
    return documents;
  };

  const findInAnyContext = (locator: string): Element | null => {
    const element = scope.document.querySelector(locator);
    if (element) return element;
    for (const frameDocument of frameDocuments()) {
      const found = frameDocument.querySelector(locator);
      if (found) return found;
    }
    return null;
  };

  const findAllInAnyContext = (locator: string): Element[] => {
    let elements = Array.from(scope.document.querySelectorAll(locator));
    for (const frameDocument of frameDocuments()) {
      elements = elements.concat(Array.from(frameDocument.querySelectorAll(locator)));
    }
    return elements;
  };

  const hasInnerText = (element: Element): element is HTMLElement => 'innerText' in element;
  const canClick = (element: Element): element is HTMLElement => 'click' in element;

  const visibleText = (element: Element): string => {
    if (hasInnerText(element) && typeof element.innerText === 'string') return element.innerText;
    return element.textContent ?? '';
  };

  const perform = (element: Element, action: ProbeAction | null): void => {
    if (!action) return;
    if (action.kind === 'click') {
      if (!canClick(element)) throw new Error(`Element <${element.tagName.toLowerCase()}> cannot be clicked`);
      element.click();
      return;
    }
    if (!('value' in element)) {
      throw new Error(`Element <${element.tagName.toLowerCase()}> has no value to set`);
    }
    element.value = action.value;
    const view = element.ownerDocument.defaultView;
    const EventCtor = view ? view.Event : Event;
    element.dispatchEvent(new EventCtor('input', { bubbles: true }));
  };

  const createWaitCondition = (spec: WaitSpec): WaitCondition => {
    let settled = false;
    let observer: MutationObserver | null = null;
    let interval: number | null = null;
    const timers = new Set<number>();

    const teardown = (): void => {
      settled = true;
      if (observer) observer.disconnect();
      if (interval !== null) scope.clearInterval(interval);
      for (const handle of timers) scope.clearTimeout(handle);
      timers.clear();
      active.delete(spec.requestId);
    };

    const control: WaitControl = {
      settle(status, message, result) {
        if (settled) return;
        teardown();
        const outcome = { requestId: spec.requestId, status, selector: spec.locator, message };
        report(result === undefined ? outcome : { ...outcome, result });
      },
      defer(delayMs, task) {
        const handle = scope.setTimeout(() => {
          timers.delete(handle);
          guarded(task);
        }, delayMs);
        timers.add(handle);
        return handle;
      },
      clear(handle) {
        scope.clearTimeout(handle);
        timers.delete(handle);
      },
    };

    const guarded = (task: () => void): void => {
      if (settled) return;
      try {
        task();
      } catch (error) {
        control.settle('error', messageOf(error));
      }
    };

    const evaluate = (): void =>
      guarded(() => {
        const verdict = spec.check(control);
        if (verdict) control.settle('success', verdict.message, verdict.result);
      });

    const condition: WaitCondition = {
      start() {
        active.set(spec.requestId, condition);
        control.defer(spec.timeoutMs, () => {
          const verdict = spec.onTimeout();
          control.settle('timeout', verdict.message, verdict.result);
        });
        evaluate();
        if (settled) return;
        guarded(() => {
          if (spec.trigger.kind === 'mutation') {
            observer = new scope.MutationObserver(evaluate);
            observer.observe(scope.document.body ?? scope.document.documentElement, {
              childList: true,
              subtree: true,
              attributes: true,
              characterData: spec.trigger.characterData,
            });
          } else {
            interval = scope.setInterval(evaluate, spec.trigger.intervalMs);
          }
        });
      },
      cancel() {
        if (!settled) teardown();
      },
    };
    return condition;
  };

  const launch = (spec: WaitSpec): void => {
    active.get(spec.requestId)?.cancel();
    createWaitCondition(spec).start();
  };

  const waitForAppear = (request: AppearRequest): void =>
    launch({
      requestId: request.requestId,
      locator: request.locator,
      timeoutMs: request.timeoutMs,
      trigger: { kind: 'mutation', characterData: false },
      check: () => {
        const element = findInAnyContext(request.locator);
        if (!element) return null;
        perform(element, request.action);
        return { message: `Element appeared: ${request.locator}` };
      },
      onTimeout: () => ({
        message: `Timed out after ${request.timeoutMs}ms waiting for ${request.locator} to appear`,
      }),
    });

  const waitForDisappear = (request: AppearRequest): void =>
    launch({
      requestId: request.requestId,
      locator: request.locator,
      timeoutMs: request.timeoutMs,
      trigger: { kind: 'mutation', characterData: false },
      check: () => {
        if (findInAnyContext(request.locator)) return null;
        if (request.action) {
          // With the target gone there is nothing to act on but the document itself.
          const root = scope.document.body ?? scope.document.documentElement;
          perform(root, request.action);
        }
        return { message: `Element is gone: ${request.locator}` };
      },
      onTimeout: () => ({
        message: `Timed out after ${request.timeoutMs}ms waiting for ${request.locator} to disappear`,
      }),
    });

  const waitForTextMatch = (request: TextMatchRequest): void =>
    launch({
      requestId: request.requestId,
      locator: request.locator,
      timeoutMs: request.timeoutMs,
      trigger: { kind: 'mutation', characterData: true },
      check: () => {
        for (const element of findAllInAnyContext(request.locator)) {
          if (visibleText(element).trim().includes(request.text)) {
            perform(element, request.action);
            return { message: `Element with text "${request.text}" found: ${request.locator}` };
          }
        }
        return null;
      },
      onTimeout: () => ({
        message: `Timed out after ${request.timeoutMs}ms waiting for ${request.locator} with text "${request.text}"`,
      }),
    });

  const conditionalAction = (request: ConditionalRequest): void => {
    const compound =
      request.clickIf === 'checked'
        ? `${request.locator}.${request.stateClass}`
        : `${request.locator}:not(.${request.stateClass})`;
    const send = (status: OutcomeStatus, message: string): void =>
      report({ requestId: request.requestId, status, selector: compound, message });
    try {
      const element = findInAnyContext(compound);
      if (element) {
        perform(element, request.action);
        send('success', `Condition met, action performed: ${compound}`);
      } else {
        send('success', `Condition not met, no action taken: ${compound}`);
      }
    } catch (error) {
      send('error', messageOf(error));
    }
  };

  const extractStableText = (request: ExtractRequest): void => {
    let lastText = '';
    let stabilityTimer: number | null = null;
    launch({
      requestId: request.requestId,
      locator: request.locator,
      timeoutMs: request.masterTimeoutMs,
      trigger: { kind: 'poll', intervalMs: request.pollIntervalMs },
      check: (control) => {
        const element = findInAnyContext(request.locator);
        if (!element) return null;
        const currentText = visibleText(element);
        if (currentText.length > lastText.length) {
          lastText = currentText;
          if (stabilityTimer !== null) control.clear(stabilityTimer);
          stabilityTimer = control.defer(request.stabilityDelayMs, () =>
            control.settle('success', `Text stable for ${request.stabilityDelayMs}ms`, currentText),
          );
        }
        return null;
      },
      onTimeout: () => ({
        message: `Master timeout of ${request.masterTimeoutMs}ms reached while extracting ${request.locator}`,
        result: lastText,
      }),
    });
  };

  return {
    findInAnyContext,
    findAllInAnyContext,
    waitForAppear,
    waitForDisappear,
    waitForTextMatch,
    conditionalAction,
    extractStableText,
    cancel(requestId) {
      const condition = active.get(requestId);
      if (!condition) return false;
      condition.cancel();
      return true;
    },
    cancelAll() {
      const conditions = Array.from(active.values());
      for (const condition of conditions) condition.cancel();
      return conditions.length;
    },
    pending() {
      return Array.from(active.keys());
    },
  };
}
