import type { Logger } from './logger';

export interface ShutdownContext {
  onShutdown: () => Promise<void>;
  logger: Pick<Logger, 'info' | 'warn' | 'error'>;
  /** Exit anyway if shutdown hangs this long (ms). Default: 30000 */
  forceExitMs?: number;
}

export function setupSignalHandlers(ctx: ShutdownContext): void {
  let shuttingDown = false;
  const forceExitMs = ctx.forceExitMs ?? 30_000;

  const handler = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      ctx.logger.warn('Forced exit on second signal', { signal });
      process.exit(1);
    }

    shuttingDown = true;
    ctx.logger.info('Received shutdown signal', { signal });

    const timer = setTimeout(() => {
      ctx.logger.error('Shutdown timed out', { forceExitMs });
      process.exit(1);
    }, forceExitMs);
    timer.unref();

    try {
      await ctx.onShutdown();
      process.exit(0);
    } catch (err) {
      ctx.logger.error('Error during shutdown', { error: err });
      process.exit(1);
    }
  };

  process.on('SIGTERM', (signal) => void handler(signal));
  process.on('SIGINT', (signal) => void handler(signal));
}
