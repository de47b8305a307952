import { AsyncLocalStorage } from 'node:async_hooks';

export class LogScope {
  private static storage = new AsyncLocalStorage<string>();

  /**
   * Run a callback within a log scope.
   * @param scopeId The id attached to every message logged inside the callback.
   * @param callback The callback to run.
   */
  static run<R>(scopeId: string, callback: () => R): R {
    return this.storage.run(scopeId, callback);
  }

  /**
   * Get the id of the innermost active scope.
   */
  static current(): string | undefined {
    return this.storage.getStore();
  }
}
