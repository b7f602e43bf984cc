import { logger } from './logger.js';

export interface ShutdownHandler {
  name: string;
  handler: () => Promise<void> | void;
  priority: number;
}

export interface GracefulShutdownOptions {
  timeoutMs?: number;
  handlerTimeoutMs?: number;
  /** Listen for SIGINT and SIGTERM. Off in tests. */
  installSignalHandlers?: boolean;
  exit?: (code: number) => void;
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private shutdownPromise: Promise<void> | null = null;
  private readonly timeoutMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly exit: (code: number) => void;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received signal: ${signal}`);
    void this.shutdown(`Signal: ${signal}`);
  };

  constructor(options: GracefulShutdownOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 5000;
    this.exit = options.exit ?? ((code) => process.exit(code));
    if (options.installSignalHandlers ?? true) {
      process.once('SIGTERM', this.onSignal);
      process.once('SIGINT', this.onSignal);
    }
  }

  registerHandler(name: string, handler: () => Promise<void> | void, priority: number = 0): void {
    this.handlers.push({ name, handler, priority });
    this.handlers.sort((a, b) => b.priority - a.priority);
  }

  async shutdown(reason: string = 'Requested', exitCode = 130): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    logger.info(`Initiating graceful shutdown: ${reason}`);

    this.shutdownPromise = this.executeShutdown(exitCode);
    return this.shutdownPromise;
  }

  /** Remove the signal listeners once the process no longer needs them. */
  dispose(): void {
    process.removeListener('SIGTERM', this.onSignal);
    process.removeListener('SIGINT', this.onSignal);
  }

  private async executeShutdown(exitCode: number): Promise<void> {
    const startTime = Date.now();
    const deadline = startTime + this.timeoutMs;
    let handlersCalled = 0;

    for (const { name, handler } of this.handlers) {
      if (Date.now() > deadline) {
        logger.error('Shutdown timeout exceeded');
        break;
      }

      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          Promise.resolve(handler()),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error('Handler timeout')), this.handlerTimeoutMs);
          }),
        ]);
        handlersCalled++;
        logger.debug(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error(`Shutdown handler failed: ${name}`, { error: String(error) });
      } finally {
        clearTimeout(timer);
      }
    }

    const duration = Date.now() - startTime;
    logger.info(`Shutdown complete: ${handlersCalled} handlers called in ${duration}ms`);

    this.dispose();
    this.exit(exitCode);
  }
}
