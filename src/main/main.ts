import { ServiceContainer } from './services/service-container';
import { resolveDataDir } from './services/config';
import { createLogger } from './services/logger';
import type { ClipboardService } from './services/clipboard-service';
import type { ClipboardSink, ClipboardSource } from '@shared/types';

export { ServiceContainer } from './services/service-container';
export { ClipboardService } from './services/clipboard-service';
export type { ChangeEvent, ChangeReason } from './services/clipboard-service';
export { resolveDataDir } from './services/config';
export { ClipkeepError, ErrorCode } from '@shared/types/errors';
export type * from '@shared/types';

const log = createLogger('Main');

const SHUTDOWN_TIMEOUT_MS = 5_000;

export interface BootstrapOptions {
  source: ClipboardSource;
  sink: ClipboardSink;
  /** Defaults to $CLIPKEEP_DATA_DIR or ~/.local/share/clipkeep */
  dataDir?: string;
  /** Start polling right away (default true) */
  autoStart?: boolean;
  /** Shut down on SIGINT/SIGTERM and log stray errors (default false) */
  handleSignals?: boolean;
}

export interface ClipkeepApp {
  container: ServiceContainer;
  clipboard: ClipboardService;
  /** Stop capturing, flush config, close the database */
  shutdown(): Promise<void>;
}

/**
 * Wire the pipeline against the given clipboard and return the query surface.
 */
export function bootstrap(options: BootstrapOptions): ClipkeepApp {
  const dataDir = options.dataDir ?? resolveDataDir();
  const container = new ServiceContainer({ dataDir, source: options.source, sink: options.sink });
  container.init();

  const clipboard = container.get('clipboard');
  if (options.autoStart !== false) {
    clipboard.start();
  }

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!closing) closing = gracefulShutdown(container);
    return closing;
  };

  if (options.handleSignals) {
    installProcessHandlers(shutdown);
  }

  return { container, clipboard, shutdown };
}

async function gracefulShutdown(container: ServiceContainer): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  // Race: graceful shutdown vs timeout
  await Promise.race([
    container.shutdown(),
    new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        log.warn(`Shutdown timed out after ${SHUTDOWN_TIMEOUT_MS}ms, giving up`);
        resolve();
      }, SHUTDOWN_TIMEOUT_MS);
    }),
  ]);
  clearTimeout(timer);
}

function installProcessHandlers(shutdown: () => Promise<void>): void {
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection:', reason);
  });

  process.on('uncaughtException', (error) => {
    log.error('Uncaught exception:', error);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      log.info(`${signal} received`);
      shutdown()
        .catch((err: unknown) => log.error('Shutdown failed:', err))
        .finally(() => process.exit(0));
    });
  }
}
