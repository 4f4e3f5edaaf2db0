import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Bridge, BridgeNotReadyError } from '../../src/bridge/bridge.js';
import { PlaywrightRemoteContext } from '../../src/bridge/playwright-context.js';
import type { PlaywrightPage } from '../../src/bridge/playwright-context.js';
import { ProbeLibrary } from '../../src/probes/library.js';
import { READY_BINDING, REPORT_BINDING } from '../../src/probes/protocol.js';
import type { AutomationLogger } from '../../src/logging/run-logger.js';
import { FakeRemoteContext } from '../helpers/fake-remote-context.js';

function mockLogger() {
  return { log: vi.fn(), logStep: vi.fn() } satisfies AutomationLogger;
}

function mockHandlers() {
  return { onOutcome: vi.fn(), onReady: vi.fn() };
}

describe('Bridge', () => {
  let context: FakeRemoteContext;
  let logger: ReturnType<typeof mockLogger>;
  let bridge: Bridge;

  beforeEach(() => {
    context = new FakeRemoteContext();
    logger = mockLogger();
    bridge = new Bridge(context, new ProbeLibrary(), logger);
  });

  it('exposes both bindings on attach and refuses a second attach', async () => {
    await bridge.attach(mockHandlers());
    expect(context.hasBinding(REPORT_BINDING)).toBe(true);
    expect(context.hasBinding(READY_BINDING)).toBe(true);
    await expect(bridge.attach(mockHandlers())).rejects.toThrow('Bridge is already attached');
  });

  it('forwards raw outcome payloads', async () => {
    const handlers = mockHandlers();
    await bridge.attach(handlers);
    context.report({ anything: 1 });
    expect(handlers.onOutcome).toHaveBeenCalledWith({ anything: 1 });
  });

  it('runs the runtime install and the handshake on the first load', async () => {
    const handlers = mockHandlers();
    await bridge.attach(handlers);
    await context.load();

    expect(bridge.getState()).toBe('ready');
    expect(handlers.onReady).toHaveBeenCalledTimes(1);
    expect(context.scripts).toHaveLength(2);
    expect(context.scripts[1]).toContain(`window.${READY_BINDING}();`);
  });

  it('notifies readiness only once', async () => {
    const handlers = mockHandlers();
    await bridge.attach(handlers);
    await context.load();
    context.invoke(READY_BINDING);

    expect(handlers.onReady).toHaveBeenCalledTimes(1);
    expect(logger.log).toHaveBeenCalledWith('warn', 'bridge_duplicate_readiness');
  });

  it('does not re-run the handshake on a later load', async () => {
    await bridge.attach(mockHandlers());
    await context.load();
    await context.load();

    expect(context.scripts).toHaveLength(2);
    expect(logger.log).toHaveBeenCalledWith('error', 'bridge_document_replaced', {
      message: 'Remote document reloaded after the bridge was ready; the bridge is not re-established',
    });
  });

  it('logs a failed handshake and stays not ready', async () => {
    context.respond = () => {
      throw new Error('navigation interrupted');
    };
    await bridge.attach(mockHandlers());
    await context.load();

    expect(bridge.isReady()).toBe(false);
    expect(logger.log).toHaveBeenCalledWith('error', 'bridge_handshake_failed', { message: 'navigation interrupted' });
  });

  it('refuses to execute before it is ready', async () => {
    await expect(bridge.execute('1')).rejects.toThrow(BridgeNotReadyError);
    await expect(bridge.execute('1')).rejects.toThrow('Bridge is not ready (state: disconnected)');
  });

  describe('testSelector', () => {
    beforeEach(async () => {
      await bridge.attach(mockHandlers());
      await context.load();
    });

    it('parses the page response', async () => {
      context.respond = () =>
        JSON.stringify({ count: 1, found: [{ tagName: 'BUTTON', id: 'go', className: '', text: 'Go' }] });
      await expect(bridge.testSelector('#go')).resolves.toEqual({
        count: 1,
        found: [{ tagName: 'BUTTON', id: 'go', className: '', text: 'Go' }],
      });
    });

    it('passes a selector error through', async () => {
      context.respond = () => JSON.stringify({ error: "'##' is not a valid selector" });
      await expect(bridge.testSelector('##')).resolves.toEqual({ error: "'##' is not a valid selector" });
    });

    it('turns an unexpected response into an error result', async () => {
      context.respond = () => 17;
      await expect(bridge.testSelector('#go')).resolves.toEqual({ error: 'Unexpected selector test response: 17' });
    });
  });
});

describe('PlaywrightRemoteContext', () => {
  it('delegates to the page', async () => {
    const listeners: Array<() => void> = [];
    const page = {
      evaluate: vi.fn().mockResolvedValue(3),
      exposeFunction: vi.fn().mockResolvedValue(undefined),
      on: vi.fn((_event: 'load', listener: () => void) => {
        listeners.push(listener);
      }),
    } satisfies PlaywrightPage;
    const remote = new PlaywrightRemoteContext(page);
    const onLoad = vi.fn();
    const binding = vi.fn();

    await expect(remote.evaluate('1 + 2')).resolves.toBe(3);
    await remote.exposeFunction('__binding', binding);
    remote.onLoad(onLoad);
    listeners[0]();

    expect(page.evaluate).toHaveBeenCalledWith('1 + 2');
    expect(page.exposeFunction).toHaveBeenCalledWith('__binding', binding);
    expect(page.on).toHaveBeenCalledWith('load', expect.any(Function));
    expect(onLoad).toHaveBeenCalledTimes(1);
  });
});
