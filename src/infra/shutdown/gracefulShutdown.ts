import type { FastifyInstance } from 'fastify';
import type { Logger } from '../logger/logger.js';

type ShutdownHandler = () => Promise<void>;

export interface GracefulShutdownOptions {
  timeoutMs: number;
  logger: Logger;
  /** Process exit; replaced in tests */
  exit?: (code: number) => void;
}

/**
 * Runs registered handlers in reverse registration order (LIFO) so that
 * servers stop before the resources they depend on are released.
 */
export class GracefulShutdownManager {
  private readonly handlers = new Map<string, ShutdownHandler>();
  private shutdownPromise: Promise<void> | null = null;
  private readonly exit: (code: number) => void;
  private readonly logger: Logger;

  constructor(private readonly options: GracefulShutdownOptions) {
    this.logger = options.logger;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  register(name: string, handler: ShutdownHandler): void {
    if (this.handlers.has(name)) {
      this.logger.warn({ name }, 'Shutdown handler already registered, replacing');
      this.handlers.delete(name);
    }
    this.handlers.set(name, handler);
    this.logger.debug({ name }, 'Shutdown handler registered');
  }

  unregister(name: string): void {
    this.handlers.delete(name);
  }

  registerFastify(fastify: FastifyInstance): void {
    this.register('http', async () => {
      await fastify.close();
    });
  }

  shutdown(signal: string): Promise<void> {
    if (this.shutdownPromise) {
      this.logger.warn({ signal }, 'Shutdown already in progress');
      return this.shutdownPromise;
    }

    this.logger.info({ signal }, 'Graceful shutdown initiated');
    this.shutdownPromise = this.executeShutdown(signal);
    return this.shutdownPromise;
  }

  private async executeShutdown(signal: string): Promise<void> {
    const timeout = this.options.timeoutMs;
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${timeout}ms`));
      }, timeout);
    });

    const failed = signal === 'uncaughtException' || signal === 'unhandledRejection';

    try {
      await Promise.race([this.executeHandlers(), timeoutPromise]);
      this.logger.info({ durationMs: Date.now() - startTime }, 'Graceful shutdown completed');
      this.exit(failed ? 1 : 0);
    } catch (error) {
      this.logger.error({ err: error, durationMs: Date.now() - startTime }, 'Graceful shutdown failed');
      this.exit(1);
    } finally {
      clearTimeout(timer);
    }
  }

  private async executeHandlers(): Promise<void> {
    const handlers = [...this.handlers.entries()].reverse();

    for (const [name, handler] of handlers) {
      try {
        this.logger.info({ handler: name }, `Executing shutdown handler: ${name}`);
        await handler();
      } catch (error) {
        // Remaining handlers still run
        this.logger.error({ err: error, handler: name }, `Shutdown handler failed: ${name}`);
      }
    }
  }

  setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      process.on(signal, () => {
        void this.shutdown(signal);
      });
    }

    process.on('uncaughtException', (error) => {
      this.logger.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ reason }, 'Unhandled rejection');
      void this.shutdown('unhandledRejection');
    });
  }

  isInProgress(): boolean {
    return this.shutdownPromise !== null;
  }
}
