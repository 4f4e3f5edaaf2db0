import type { BridgeState, SelectorTestResult } from '../types/index.js';
import type { ProbeLibrary } from '../probes/library.js';
import { READY_BINDING, REPORT_BINDING } from '../probes/protocol.js';
import { SelectorTestResultSchema } from '../schemas/index.js';
import type { AutomationLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';
import type { RemoteContext } from './remote-context.js';

export class BridgeNotReadyError extends Error {
  constructor(state: BridgeState) {
    super(`Bridge is not ready (state: ${state})`);
    this.name = 'BridgeNotReadyError';
  }
}

export interface BridgeHandlers {
  /** Every step outcome the remote runtime reports, unparsed. */
  onOutcome(payload: unknown): void;
  onReady(): void;
}

/**
 * Channel to one remote document.
 *
 * disconnected -> handshakeInFlight on the first load, -> ready when the page
 * confirms. Never goes back: there is no reconnect, and a failed handshake is
 * not retried.
 */
export class Bridge {
  private state: BridgeState = 'disconnected';
  private attached = false;

  constructor(
    private context: RemoteContext,
    private probes: ProbeLibrary,
    private logger: AutomationLogger = silentLogger,
  ) {}

  getState(): BridgeState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  /** Expose the host bindings and wait for the page to load. Call once, before navigating. */
  async attach(handlers: BridgeHandlers): Promise<void> {
    if (this.attached) throw new Error('Bridge is already attached');
    this.attached = true;

    await this.context.exposeFunction(REPORT_BINDING, (payload) => handlers.onOutcome(payload));
    await this.context.exposeFunction(READY_BINDING, () => {
      if (this.confirmReadiness()) handlers.onReady();
    });
    this.context.onLoad(() => {
      void this.handleLoad();
    });
    this.logger.log('debug', 'bridge_attached');
  }

  /** Returns true only for the confirmation that moved the bridge to ready. */
  confirmReadiness(): boolean {
    if (this.state === 'ready') {
      this.logger.log('warn', 'bridge_duplicate_readiness');
      return false;
    }
    this.state = 'ready';
    this.logger.log('info', 'bridge_ready');
    return true;
  }

  async execute(script: string): Promise<unknown> {
    if (this.state !== 'ready') throw new BridgeNotReadyError(this.state);
    return this.context.evaluate(script);
  }

  async testSelector(locator: string): Promise<SelectorTestResult> {
    const raw = await this.execute(this.probes.selectorTestScript(locator));
    if (typeof raw !== 'string') {
      return { error: `Unexpected selector test response: ${String(raw)}` };
    }
    try {
      return SelectorTestResultSchema.parse(JSON.parse(raw));
    } catch (error) {
      return { error: `Invalid selector test response: ${error instanceof Error ? error.message : String(error)}` };
    }
  }

  private async handleLoad(): Promise<void> {
    if (this.state === 'ready') {
      // The probe runtime died with the old document; probes will fail from here on.
      this.logger.log('error', 'bridge_document_replaced', {
        message: 'Remote document reloaded after the bridge was ready; the bridge is not re-established',
      });
      return;
    }
    if (this.state === 'handshakeInFlight') {
      this.logger.log('warn', 'bridge_load_during_handshake');
      return;
    }

    this.state = 'handshakeInFlight';
    this.logger.log('debug', 'bridge_handshake_started');
    try {
      await this.context.evaluate(this.probes.runtimeScript());
      const accepted = await this.context.evaluate(this.probes.handshakeScript());
      if (accepted !== true) {
        this.logger.log('error', 'bridge_handshake_rejected', { response: String(accepted) });
      }
    } catch (error) {
      this.logger.log('error', 'bridge_handshake_failed', {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
