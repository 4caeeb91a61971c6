// Process-level error handlers and graceful shutdown
import type { Server } from 'http';
import { logger } from '@/services/logger';
import { errorMessage } from '@/errors/pipelineErrors';

export interface ShutdownTarget {
  server: Server;
  /** Releases timers and in-memory state. */
  cleanup: () => void;
}

let target: ShutdownTarget | null = null;
let shuttingDown = false;

export function setShutdownTarget(next: ShutdownTarget): void {
  target = next;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => gracefulShutdown(signal, 0));
  }
}

function gracefulShutdown(reason: string, exitCode: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  // in-flight turns get 15s to finish
  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown', { reason });
    process.exit(1);
  }, 15000);
  forced.unref();

  if (!target) {
    process.exit(exitCode);
    return;
  }

  const { server, cleanup } = target;
  server.close((err) => {
    cleanup();
    if (err) logger.error('process:server_close_failed', { error: err.message });
    clearTimeout(forced);
    process.exit(err ? 1 : exitCode);
  });
}
