import type { Binding, RemoteContext } from '../../src/bridge/remote-context.js';
import { READY_BINDING, REPORT_BINDING } from '../../src/probes/protocol.js';
import type { ProbeMethod } from '../../src/probes/protocol.js';
import type { StepOutcome } from '../../src/types/index.js';

export interface ProbeCall {
  method: ProbeMethod;
  requestId: string;
  script: string;
}

const PROBE_CALL = /^\s*probes\.(waitForAppear|waitForDisappear|waitForTextMatch|conditionalAction|extractStableText)\(/m;
const REQUEST_ID = /requestId: `([^`]*)`/;

function isProbeMethod(value: string): value is ProbeMethod {
  return ['waitForAppear', 'waitForDisappear', 'waitForTextMatch', 'conditionalAction', 'extractStableText'].includes(
    value,
  );
}

/** Lets pending promise callbacks and microtasks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Counter-based ids, so tests can address dispatches as req-1, req-2, ... */
export function sequentialIds(prefix = 'req'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * In-memory stand-in for a page. Records every script, answers the handshake
 * by calling the readiness binding, and lets tests play the remote side.
 */
export class FakeRemoteContext implements RemoteContext {
  readonly scripts: string[] = [];
  acceptHandshake = true;
  /** Answer for every script other than the handshake. */
  respond: (script: string) => unknown = () => true;

  private bindings = new Map<string, Binding>();
  private loadListeners: Array<() => void> = [];

  async evaluate(script: string): Promise<unknown> {
    this.scripts.push(script);
    if (script.includes(`window.${READY_BINDING}();`)) {
      if (!this.acceptHandshake) return false;
      this.invoke(READY_BINDING);
      return true;
    }
    return this.respond(script);
  }

  async exposeFunction(name: string, binding: Binding): Promise<void> {
    this.bindings.set(name, binding);
  }

  onLoad(listener: () => void): void {
    this.loadListeners.push(listener);
  }

  hasBinding(name: string): boolean {
    return this.bindings.has(name);
  }

  /** Fire the page load and let the handshake finish. */
  async load(): Promise<void> {
    for (const listener of this.loadListeners) listener();
    await flush();
  }

  report(outcome: StepOutcome | Record<string, unknown>): void {
    this.invoke(REPORT_BINDING, outcome);
  }

  succeed(requestId: string, result?: string): void {
    const outcome: StepOutcome = { requestId, status: 'success', selector: 'remote', message: 'ok' };
    this.report(result === undefined ? outcome : { ...outcome, result });
  }

  invoke(name: string, ...args: unknown[]): unknown {
    const binding = this.bindings.get(name);
    if (!binding) throw new Error(`Binding ${name} is not exposed`);
    return binding(...args);
  }

  probeCalls(): ProbeCall[] {
    const calls: ProbeCall[] = [];
    for (const script of this.scripts) {
      const method = PROBE_CALL.exec(script)?.[1];
      const requestId = REQUEST_ID.exec(script)?.[1];
      if (method !== undefined && requestId !== undefined && isProbeMethod(method)) {
        calls.push({ method, requestId, script });
      }
    }
    return calls;
  }

  scriptsContaining(fragment: string): string[] {
    return this.scripts.filter((script) => script.includes(fragment));
  }
}
