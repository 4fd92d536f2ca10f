/**
 * Request-scoped data carried through the async call chain.
 *
 * HTTP hooks and the gRPC interceptor open a context per call; the logger
 * mixin reads it so every line written while serving the call carries the
 * correlation id and user id.
 */
import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContextData {
  correlationId: string;
  /** Authenticated subject, set once the JWT has been verified */
  userId?: string;
  traceId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const RequestContext = {
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  runAsync<T>(context: RequestContextData, fn: () => Promise<T>): Promise<T> {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Bind the context to the rest of the current synchronous execution and
   * everything it schedules. Used from Fastify hooks, which cannot wrap the
   * handler in a callback.
   */
  enter(context: RequestContextData): void {
    asyncLocalStorage.enterWith(context);
  },

  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  getCorrelationId(): string | undefined {
    return asyncLocalStorage.getStore()?.correlationId;
  },

  getUserId(): string | undefined {
    return asyncLocalStorage.getStore()?.userId;
  },

  /** Attach the user to the active context, if any */
  setUserId(userId: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
      store.userId = userId;
    }
  },
};

export default RequestContext;
