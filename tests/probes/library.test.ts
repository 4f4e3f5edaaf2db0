import { describe, it, expect, vi } from 'vitest';
import { ProbeLibrary } from '../../src/probes/library.js';
import type { DispatchableStep } from '../../src/probes/library.js';
import { RUNTIME_GLOBAL } from '../../src/probes/protocol.js';
import { createProbeScope } from '../helpers/probe-scope.js';

function mockRuntime() {
  return {
    waitForAppear: vi.fn(),
    waitForDisappear: vi.fn(),
    waitForTextMatch: vi.fn(),
    conditionalAction: vi.fn(),
    extractStableText: vi.fn(),
    cancel: vi.fn().mockReturnValue(true),
    cancelAll: vi.fn().mockReturnValue(2),
  };
}

/** Run a generated script against a stand-in `window`. */
function run(script: string, window: Record<string, unknown>): unknown {
  return new Function('window', `return ${script};`)(window);
}

describe('ProbeLibrary', () => {
  const probes = new ProbeLibrary({ debug: false, pollIntervalMs: 250 });

  describe('compile', () => {
    it('compiles clickWhenVisible into an appear-and-click probe', () => {
      const runtime = mockRuntime();
      const step: DispatchableStep = { kind: 'clickWhenVisible', label: 'Add', selector: '#add', timeoutMs: 5000 };

      expect(run(probes.compile(step, 'req-1'), { [RUNTIME_GLOBAL]: runtime })).toBe(true);
      expect(runtime.waitForAppear).toHaveBeenCalledWith({
        requestId: 'req-1',
        locator: '#add',
        timeoutMs: 5000,
        action: { kind: 'click' },
      });
    });

    it('carries a typeText payload through unchanged', () => {
      const runtime = mockRuntime();
      const payload = 'Speaker 1: `hello` ${name}\r\nC:\\temp\\out.txt "quoted" it\'s';
      const step: DispatchableStep = {
        kind: 'typeText',
        label: 'Paste',
        selector: 'textarea[formcontrolname="text"]',
        payload,
        timeoutMs: 5000,
      };

      run(probes.compile(step, 'req-2'), { [RUNTIME_GLOBAL]: runtime });
      expect(runtime.waitForAppear).toHaveBeenCalledWith({
        requestId: 'req-2',
        locator: 'textarea[formcontrolname="text"]',
        timeoutMs: 5000,
        action: { kind: 'setValue', value: payload },
      });
    });

    it('compiles the remaining step kinds to their probes', () => {
      const runtime = mockRuntime();
      const window = { [RUNTIME_GLOBAL]: runtime };

      run(probes.compile({ kind: 'clickMatchingText', label: 't', selector: 'button', text: 'Insert', timeoutMs: 10 }, 'a'), window);
      run(
        probes.compile(
          { kind: 'conditionalClick', label: 'c', selector: '#all', stateClass: 'on', clickIf: 'unchecked' },
          'b',
        ),
        window,
      );
      run(probes.compile({ kind: 'waitForDisappear', label: 'd', selector: '.spin', timeoutMs: 20 }, 'c'), window);
      run(
        probes.compile(
          { kind: 'extractStableText', label: 'e', selector: '.answer', masterTimeoutMs: 30, stabilityDelayMs: 4 },
          'd',
        ),
        window,
      );

      expect(runtime.waitForTextMatch).toHaveBeenCalledWith({
        requestId: 'a',
        locator: 'button',
        text: 'Insert',
        timeoutMs: 10,
        action: { kind: 'click' },
      });
      expect(runtime.conditionalAction).toHaveBeenCalledWith({
        requestId: 'b',
        locator: '#all',
        stateClass: 'on',
        clickIf: 'unchecked',
        action: { kind: 'click' },
      });
      expect(runtime.waitForDisappear).toHaveBeenCalledWith({
        requestId: 'c',
        locator: '.spin',
        timeoutMs: 20,
        action: null,
      });
      expect(runtime.extractStableText).toHaveBeenCalledWith({
        requestId: 'd',
        locator: '.answer',
        masterTimeoutMs: 30,
        stabilityDelayMs: 4,
        pollIntervalMs: 250,
      });
    });

    it('throws in the page when the runtime is missing', () => {
      const script = probes.compile({ kind: 'clickWhenVisible', label: 'x', selector: '#x', timeoutMs: 1 }, 'r');
      expect(() => run(script, {})).toThrow('Probe runtime is not installed');
    });
  });

  describe('cancellation scripts', () => {
    it('cancels one request by id', () => {
      const runtime = mockRuntime();
      expect(run(probes.cancelScript('req-`7`'), { [RUNTIME_GLOBAL]: runtime })).toBe(true);
      expect(runtime.cancel).toHaveBeenCalledWith('req-`7`');
    });

    it('cancels everything and tolerates a missing runtime', () => {
      const runtime = mockRuntime();
      expect(run(probes.cancelAllScript(), { [RUNTIME_GLOBAL]: runtime })).toBe(2);
      expect(run(probes.cancelAllScript(), {})).toBe(0);
      expect(run(probes.cancelScript('r'), {})).toBe(false);
    });
  });

  describe('handshakeScript', () => {
    it('confirms readiness only when the bindings and runtime are present', () => {
      const confirm = vi.fn();
      const complete = { __confirmBridgeReadiness: confirm, __reportStepOutcome: vi.fn(), [RUNTIME_GLOBAL]: {} };
      const log = vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(run(probes.handshakeScript(), complete)).toBe(true);
      expect(confirm).toHaveBeenCalledTimes(1);

      expect(run(probes.handshakeScript(), { __confirmBridgeReadiness: confirm })).toBe(false);
      expect(confirm).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('[bridge] transport is not available');
      log.mockRestore();
    });
  });

  describe('runtimeScript', () => {
    it('installs the runtime once and routes outcomes to the report binding', async () => {
      const { dom, scope } = createProbeScope('<body><button id="go">Go</button></body>');
      const report = vi.fn().mockResolvedValue(undefined);
      const window: Record<string, unknown> = { ...scope, __reportStepOutcome: report };
      // The serialized runtime reads its page globals from `window`.
      const install = new Function('window', 'document', `return ${probes.runtimeScript()};`);

      expect(install(window, scope.document)).toBe(true);
      expect(install(window, scope.document)).toBe(false);

      const runtime = window[RUNTIME_GLOBAL];
      expect(runtime).toBeTypeOf('object');
      run(
        probes.compile({ kind: 'clickWhenVisible', label: 'Go', selector: '#go', timeoutMs: 1000 }, 'req-9'),
        window,
      );

      expect(report).toHaveBeenCalledWith({
        requestId: 'req-9',
        status: 'success',
        selector: '#go',
        message: 'Element appeared: #go',
      });
      dom.window.close();
    });
  });

  describe('selectorTestScript', () => {
    it('describes every match in the top document', () => {
      const { dom } = createProbeScope(
        '<body><button id="a" class="x y">First</button><button>' + 'z'.repeat(150) + '</button></body>',
      );
      const evaluate = new Function('document', `return ${probes.selectorTestScript('button')};`);
      const parsed: unknown = JSON.parse(evaluate(dom.window.document));

      expect(parsed).toEqual({
        count: 2,
        found: [
          { tagName: 'BUTTON', id: 'a', className: 'x y', text: 'First' },
          { tagName: 'BUTTON', id: '', className: '', text: 'z'.repeat(100) },
        ],
      });
      dom.window.close();
    });

    it('returns the error for an invalid locator', () => {
      const { dom } = createProbeScope('<body></body>');
      const evaluate = new Function('document', `return ${probes.selectorTestScript('##nope')};`);
      const parsed: unknown = JSON.parse(evaluate(dom.window.document));

      expect(parsed).toEqual({ error: expect.any(String) });
      dom.window.close();
    });
  });
});
