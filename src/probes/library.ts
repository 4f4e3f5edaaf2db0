import type { AutomationStep, InvalidStep } from '../types/index.js';
import { installProbeRuntime } from './runtime.js';
import { READY_BINDING, REPORT_BINDING, RUNTIME_GLOBAL } from './protocol.js';
import type {
  AppearRequest,
  ConditionalRequest,
  ExtractRequest,
  ProbeAction,
  ProbeMethod,
  TextMatchRequest,
} from './protocol.js';
import { renderLiteral, renderProbeCall } from './template.js';

export type DispatchableStep = Exclude<AutomationStep, InvalidStep>;

export interface ProbeLibraryOptions {
  debug: boolean;
  pollIntervalMs: number;
}

const CLICK: ProbeAction = { kind: 'click' };

/**
 * Produces every script the host sends to the remote document. Stateless and
 * safe to share across windows.
 */
export class ProbeLibrary {
  constructor(private options: ProbeLibraryOptions = { debug: false, pollIntervalMs: 500 }) {}

  runtimeScript(): string {
    return [
      '(() => {',
      `  if (window.${RUNTIME_GLOBAL}) return false;`,
      `  const report = (outcome) => {`,
      `    const send = window.${REPORT_BINDING};`,
      `    if (typeof send !== 'function') {`,
      `      console.error('[probe] outcome binding missing', outcome);`,
      '      return;',
      '    }',
      `    Promise.resolve(send(outcome)).catch((error) => console.error('[probe] outcome delivery failed', error));`,
      '  };',
      `  window.${RUNTIME_GLOBAL} = (${installProbeRuntime.toString()})(window, report, ${renderLiteral({ debug: this.options.debug })});`,
      '  return true;',
      '})()',
    ].join('\n');
  }

  handshakeScript(): string {
    return [
      '(() => {',
      `  if (typeof window.${READY_BINDING} !== 'function' || typeof window.${REPORT_BINDING} !== 'function' || !window.${RUNTIME_GLOBAL}) {`,
      `    console.error('[bridge] transport is not available');`,
      '    return false;',
      '  }',
      `  window.${READY_BINDING}();`,
      '  return true;',
      '})()',
    ].join('\n');
  }

  compile(step: DispatchableStep, requestId: string): string {
    switch (step.kind) {
      case 'clickWhenVisible': {
        const request = {
          requestId,
          locator: step.selector,
          timeoutMs: step.timeoutMs,
          action: CLICK,
        } satisfies AppearRequest;
        return this.call('waitForAppear', request);
      }
      case 'typeText': {
        const request = {
          requestId,
          locator: step.selector,
          timeoutMs: step.timeoutMs,
          action: { kind: 'setValue', value: step.payload },
        } satisfies AppearRequest;
        return this.call('waitForAppear', request);
      }
      case 'clickMatchingText': {
        const request = {
          requestId,
          locator: step.selector,
          text: step.text,
          timeoutMs: step.timeoutMs,
          action: CLICK,
        } satisfies TextMatchRequest;
        return this.call('waitForTextMatch', request);
      }
      case 'conditionalClick': {
        const request = {
          requestId,
          locator: step.selector,
          stateClass: step.stateClass,
          clickIf: step.clickIf,
          action: CLICK,
        } satisfies ConditionalRequest;
        return this.call('conditionalAction', request);
      }
      case 'waitForDisappear': {
        const request = {
          requestId,
          locator: step.selector,
          timeoutMs: step.timeoutMs,
          action: null,
        } satisfies AppearRequest;
        return this.call('waitForDisappear', request);
      }
      case 'extractStableText': {
        const request = {
          requestId,
          locator: step.selector,
          masterTimeoutMs: step.masterTimeoutMs,
          stabilityDelayMs: step.stabilityDelayMs,
          pollIntervalMs: this.options.pollIntervalMs,
        } satisfies ExtractRequest;
        return this.call('extractStableText', request);
      }
    }
  }

  cancelScript(requestId: string): string {
    return `(() => { const probes = window.${RUNTIME_GLOBAL}; return probes ? probes.cancel(${renderLiteral(requestId)}) : false; })()`;
  }

  cancelAllScript(): string {
    return `(() => { const probes = window.${RUNTIME_GLOBAL}; return probes ? probes.cancelAll() : 0; })()`;
  }

  /** Count and describe the matches of a locator in the top document. */
  selectorTestScript(locator: string): string {
    return [
      '(() => {',
      '  try {',
      `    const elements = Array.from(document.querySelectorAll(${renderLiteral(locator)}));`,
      '    const found = elements.map((el) => ({',
      '      tagName: el.tagName,',
      `      id: el.id || '',`,
      `      className: typeof el.className === 'string' ? el.className : '',`,
      `      text: (typeof el.innerText === 'string' ? el.innerText : el.textContent || '').substring(0, 100),`,
      '    }));',
      '    return JSON.stringify({ count: elements.length, found });',
      '  } catch (error) {',
      '    return JSON.stringify({ error: error instanceof Error ? error.message : String(error) });',
      '  }',
      '})()',
    ].join('\n');
  }

  private call(
    method: ProbeMethod,
    request: AppearRequest | TextMatchRequest | ConditionalRequest | ExtractRequest,
  ): string {
    return renderProbeCall(RUNTIME_GLOBAL, method, { ...request });
  }
}
