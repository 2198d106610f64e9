import { describe, it, expect } from '@jest/globals';
import pino, { type Logger } from 'pino';
import { createShutdownHandler } from '@/lib/runtime-logging';

function recordingLogger(): { logger: Logger; entries: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
  return {
    logger,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('createShutdownHandler', () => {
  it('stops the server and exits with code 0', async () => {
    const { logger, entries } = recordingLogger();
    const codes: number[] = [];
    let stopped = false;
    const handler = createShutdownHandler(
      { stop: async () => { stopped = true; } },
      logger,
      true,
      1000,
      (code) => codes.push(code),
    );

    await handler('SIGTERM');

    expect(stopped).toBe(true);
    expect(codes).toEqual([0]);
    const done = entries().find((entry) => entry.msg === 'Shutdown completed successfully');
    expect(done).toMatchObject({ signal: 'SIGTERM', exitCode: 0, graceful: true });
  });

  it('exits with code 1 and logs the error when stopping fails', async () => {
    const { logger, entries } = recordingLogger();
    const codes: number[] = [];
    const handler = createShutdownHandler(
      { stop: async () => { throw new Error('transport already closed'); } },
      logger,
      true,
      1000,
      (code) => codes.push(code),
    );

    await handler('SIGINT');

    expect(codes).toEqual([1]);
    const failed = entries().find((entry) => entry.msg === 'Shutdown error');
    expect(failed).toMatchObject({
      signal: 'SIGINT',
      exitCode: 1,
      graceful: false,
      error: 'transport already closed',
    });
  });

  it('forces exit code 1 when stopping outlasts the timeout', async () => {
    const { logger } = recordingLogger();
    const exited = new Promise<number>((resolve) => {
      const handler = createShutdownHandler(
        { stop: () => new Promise<void>(() => undefined) },
        logger,
        true,
        20,
        resolve,
      );
      void handler('SIGTERM');
    });

    await expect(exited).resolves.toBe(1);
  });
});
