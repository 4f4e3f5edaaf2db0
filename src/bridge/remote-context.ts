export type Binding = (...args: unknown[]) => unknown;

/**
 * The remote document as the host sees it: scripts go in, callbacks come
 * back through exposed bindings, and the page announces when it has loaded.
 */
export interface RemoteContext {
  evaluate(script: string): Promise<unknown>;
  exposeFunction(name: string, binding: Binding): Promise<void>;
  onLoad(listener: () => void): void;
}
