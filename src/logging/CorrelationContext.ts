import { AsyncLocalStorage } from 'async_hooks';

/**
 * CorrelationContext - Run-scoped context for correlation IDs
 *
 * Uses AsyncLocalStorage so that every log entry written while a corpus is
 * being processed carries the same correlation ID, across awaits.
 */
export class CorrelationContext {
  private static asyncLocalStorage = new AsyncLocalStorage<Map<string, unknown>>();

  /**
   * Run a callback with the provided context
   *
   * @param context The context to be available during the callback execution
   * @param callback The function to execute within the context
   * @returns The result of the callback
   */
  static run<T>(context: Record<string, unknown>, callback: () => T): T {
    const contextMap = new Map(Object.entries(context));
    return this.asyncLocalStorage.run(contextMap, callback);
  }

  static get(key: string): unknown {
    const store = this.asyncLocalStorage.getStore();
    if (!store) return undefined;
    return store.get(key);
  }

  static getCorrelationId(): string | undefined {
    const value = this.get('correlationId');
    return typeof value === 'string' ? value : undefined;
  }

  static generateCorrelationId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
  }

  /**
   * Create a new context with a correlation ID
   *
   * @param additionalContext Additional context to include
   */
  static createContext(additionalContext: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      correlationId: this.generateCorrelationId(),
      timestamp: new Date().toISOString(),
      ...additionalContext
    };
  }
}
