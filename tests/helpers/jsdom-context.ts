import { JSDOM } from 'jsdom';
import { runInContext } from 'node:vm';
import type { Binding, RemoteContext } from '../../src/bridge/remote-context.js';

/**
 * A page that really runs the generated scripts. Arguments passed to exposed
 * bindings are copied through JSON and delivered on a later microtask, the
 * way a browser binding crosses the process boundary.
 */
export class JsdomRemoteContext implements RemoteContext {
  readonly dom: JSDOM;
  private loadListeners: Array<() => void> = [];

  constructor(html: string) {
    this.dom = new JSDOM(html, { runScripts: 'outside-only', url: 'https://notebook.test/' });
  }

  get document(): Document {
    return this.dom.window.document;
  }

  async evaluate(script: string): Promise<unknown> {
    const value: unknown = runInContext(script, this.dom.getInternalVMContext());
    return value;
  }

  async exposeFunction(name: string, binding: Binding): Promise<void> {
    const relay = (...args: unknown[]): Promise<unknown> => {
      const copied: unknown[] = args.map((arg) => (arg === undefined ? undefined : JSON.parse(JSON.stringify(arg))));
      return new Promise((resolve, reject) => {
        queueMicrotask(() => {
          try {
            resolve(binding(...copied));
          } catch (error) {
            reject(error);
          }
        });
      });
    };
    Object.defineProperty(this.dom.window, name, { value: relay, configurable: true, writable: true });
  }

  onLoad(listener: () => void): void {
    this.loadListeners.push(listener);
  }

  /** Announce the document as loaded, as a navigation would. */
  fireLoad(): void {
    for (const listener of this.loadListeners) listener();
  }

  close(): void {
    this.dom.window.close();
  }
}
