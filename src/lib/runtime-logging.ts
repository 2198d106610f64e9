/**
 * Runtime Logging - Startup and Shutdown
 *
 * Structured entries go through pino; the human-readable lines go to
 * stderr unless quiet. Nothing is written to stdout, which carries the
 * MCP protocol.
 */

import type { Logger } from 'pino';
import type { TransportConfig } from '@/app';
import { extractErrorMessage } from '@/lib/errors';

export interface StartupInfo {
  appName: string;
  version: string;
  logLevel: string;
  transport: TransportConfig;
  devMode?: boolean;
  toolCount: number;
}

export interface ShutdownInfo {
  signal: string;
  /** Duration of the shutdown in milliseconds */
  duration: number;
  exitCode: number;
  graceful: boolean;
}

/**
 * Anything that can be stopped on shutdown
 */
export interface Stoppable {
  stop(): Promise<void>;
}

export function logStartup(info: StartupInfo, logger: Logger, quiet = false): void {
  logger.info(
    {
      version: info.version,
      config: {
        logLevel: info.logLevel,
        devMode: info.devMode,
        transport: info.transport,
      },
      toolCount: info.toolCount,
    },
    `Starting ${info.appName} MCP server`,
  );

  if (!quiet) {
    console.error(`Starting ${info.appName} MCP server...`);
    console.error(`  Version: ${info.version}`);
    console.error(`  Log level: ${info.logLevel}`);
    console.error(`  Transport: ${info.transport.transport}`);
    console.error(`  Tools: ${info.toolCount} loaded`);

    if (info.devMode) {
      console.error('  Development mode enabled');
    }
  }
}

export function logStartupSuccess(transport: TransportConfig, logger: Logger, quiet = false): void {
  logger.info({ transport }, 'MCP server started successfully');

  if (!quiet) {
    console.error('Server started; ready for MCP requests on stdio');
  }
}

export function logStartupFailure(error: unknown, logger: Logger, quiet = false): void {
  const message = extractErrorMessage(error);
  logger.error({ error: message }, 'Server startup failed');

  if (!quiet) {
    console.error('Server startup failed');
    console.error(`  Error: ${message}`);
  }
}

function logShutdownStart(signal: string, logger: Logger, quiet: boolean): void {
  logger.info({ signal }, 'Shutdown initiated');

  if (!quiet) {
    console.error(`\nReceived ${signal}, shutting down...`);
  }
}

function logShutdownResult(info: ShutdownInfo, logger: Logger, quiet: boolean, error?: unknown): void {
  if (error === undefined) {
    logger.info(
      { signal: info.signal, duration: info.duration, exitCode: info.exitCode, graceful: info.graceful },
      'Shutdown completed successfully',
    );
    if (!quiet) {
      console.error('Shutdown complete');
    }
    return;
  }

  const message = extractErrorMessage(error);
  logger.error(
    { error: message, signal: info.signal, duration: info.duration, exitCode: info.exitCode, graceful: false },
    'Shutdown error',
  );
  if (!quiet) {
    console.error(`Shutdown error: ${message}`);
  }
}

/**
 * Build a signal handler that stops the server and exits.
 * A stop that exceeds `timeoutMs` forces exit code 1.
 */
export function createShutdownHandler(
  server: Stoppable,
  logger: Logger,
  quiet = false,
  timeoutMs = 10000,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  return async (signal: string): Promise<void> => {
    const startTime = Date.now();
    logShutdownStart(signal, logger, quiet);

    const shutdownTimeout = setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      exit(1);
    }, timeoutMs);

    try {
      await server.stop();
      clearTimeout(shutdownTimeout);
      const info: ShutdownInfo = { signal, duration: Date.now() - startTime, exitCode: 0, graceful: true };
      logShutdownResult(info, logger, quiet);
      exit(info.exitCode);
    } catch (error) {
      clearTimeout(shutdownTimeout);
      const info: ShutdownInfo = { signal, duration: Date.now() - startTime, exitCode: 1, graceful: false };
      logShutdownResult(info, logger, quiet, error);
      exit(info.exitCode);
    }
  };
}

export function installShutdownHandlers(server: Stoppable, logger: Logger, quiet = false): void {
  const shutdownHandler = createShutdownHandler(server, logger, quiet);

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdownHandler(signal).catch((error: unknown) => {
        logger.error({ error: extractErrorMessage(error) }, `Error during ${signal} shutdown`);
        process.exit(1);
      });
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message }, 'Uncaught exception');
    console.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: extractErrorMessage(reason) }, 'Unhandled rejection');
    console.error(`Unhandled rejection: ${extractErrorMessage(reason)}`);
    process.exit(1);
  });
}
