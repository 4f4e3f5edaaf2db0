import type { Binding, RemoteContext } from './remote-context.js';

/** The subset of a Playwright `Page` the bridge relies on. */
export interface PlaywrightPage {
  evaluate(expression: string): Promise<unknown>;
  exposeFunction(name: string, callback: Binding): Promise<void>;
  on(event: 'load', listener: () => void): unknown;
}

export class PlaywrightRemoteContext implements RemoteContext {
  constructor(private page: PlaywrightPage) {}

  async evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async exposeFunction(name: string, binding: Binding): Promise<void> {
    await this.page.exposeFunction(name, binding);
  }

  onLoad(listener: () => void): void {
    this.page.on('load', () => listener());
  }
}
