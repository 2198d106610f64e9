/**
 * External Tool Runner
 *
 * Launches kubectl, helm, flux and kubeconform as child processes with an
 * explicit argument vector (never through a shell), feeds optional stdin,
 * captures both output streams and enforces a wall-clock timeout.
 *
 * The runner never rejects. Spawn failures, non-zero exits and timeouts are
 * all reported through the returned {@link ToolInvocationResult} so callers
 * classify them in one place.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, LIMITS, NOT_FOUND_EXIT_CODE } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';

/**
 * One request to run an external program
 */
export interface ToolInvocation {
  program: string;
  args: readonly string[];
  /** Working directory; defaults to the server's own */
  cwd?: string;
  /** Written to the child's stdin, which is closed afterwards in every case */
  input?: string;
  timeoutMs: number;
}

/**
 * Outcome of one external program run. Frozen once produced.
 */
export interface ToolInvocationResult {
  readonly command: string;
  readonly program: string;
  readonly args: readonly string[];
  /** Process exit code; 127 when the program could not be started */
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly timedOut: boolean;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolInvocationResult>;
}

export interface ProcessRunnerOptions {
  /** Time between SIGTERM and SIGKILL once a timeout fires */
  killGracePeriodMs?: number;
  /** Per-stream capture limit; output past it is dropped */
  maxOutputBytes?: number;
}

/**
 * Render a program and its arguments as a single display string.
 * Only used for logs and reports; the process itself gets the raw vector.
 */
export function formatCommand(program: string, args: readonly string[]): string {
  return [program, ...args].map(quoteForDisplay).join(' ');
}

function quoteForDisplay(part: string): string {
  if (part.length > 0 && /^[\w@%+=:,./-]+$/.test(part)) {
    return part;
  }
  return `'${part.replace(/'/g, `'\\''`)}'`;
}

class OutputCollector {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  attach(stream: Readable): void {
    stream.on('data', (chunk: Buffer) => {
      if (this.size >= this.limit) {
        this.truncated = true;
        return;
      }
      const remaining = this.limit - this.size;
      const accepted = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
      if (accepted.length < chunk.length) {
        this.truncated = true;
      }
      this.chunks.push(accepted);
      this.size += accepted.length;
    });
  }

  get wasTruncated(): boolean {
    return this.truncated;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/** Exit code reported for a child terminated by a signal */
const SIGNALLED_EXIT_CODE = -1;

function runProcess(
  invocation: ToolInvocation,
  logger: Logger,
  killGracePeriodMs: number,
  maxOutputBytes: number,
): Promise<ToolInvocationResult> {
  const { program, args, cwd, input, timeoutMs } = invocation;
  const command = formatCommand(program, args);
  const startedAt = Date.now();
  const stdout = new OutputCollector(maxOutputBytes);
  const stderr = new OutputCollector(maxOutputBytes);

  return new Promise((resolve) => {
    let settled = false;
    let timedOut = false;
    let timeoutTimer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;
    let child: ChildProcessWithoutNullStreams | undefined;

    const finish = (exitCode: number, spawnError?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);

      if (child && timedOut) {
        // Grandchildren may still hold the pipes open
        child.stdout.destroy();
        child.stderr.destroy();
      }

      const capturedStderr = stderr.text();
      const result: ToolInvocationResult = Object.freeze({
        command,
        program,
        args: Object.freeze([...args]),
        exitCode,
        stdout: stdout.text(),
        stderr: spawnError
          ? [capturedStderr, spawnError].filter((part) => part.length > 0).join('\n')
          : capturedStderr,
        durationMs: Date.now() - startedAt,
        timedOut,
      });

      if (stdout.wasTruncated || stderr.wasTruncated) {
        logger.warn({ command, limit: maxOutputBytes }, 'External tool output truncated');
      }
      logger.debug(
        { command, exitCode, durationMs: result.durationMs, timedOut },
        'External tool finished',
      );
      resolve(result);
    };

    logger.debug({ command, cwd, timeoutMs, hasInput: input !== undefined }, 'Running external tool');

    try {
      child = spawn(program, [...args], { cwd, windowsHide: true });
    } catch (error) {
      finish(NOT_FOUND_EXIT_CODE, extractErrorMessage(error));
      return;
    }
    const proc = child;

    stdout.attach(proc.stdout);
    stderr.attach(proc.stderr);

    proc.on('error', (error) => {
      if (proc.pid === undefined) {
        logger.debug({ command, error: error.message }, 'External tool could not be started');
        finish(NOT_FOUND_EXIT_CODE, error.message);
        return;
      }
      logger.warn({ command, error: error.message }, 'External tool process error');
    });

    proc.on('exit', (code) => {
      if (timedOut) {
        finish(code ?? SIGNALLED_EXIT_CODE);
      }
    });

    proc.on('close', (code, signal) => {
      if (proc.pid === undefined) {
        finish(NOT_FOUND_EXIT_CODE, `${program}: command not found`);
        return;
      }
      if (signal !== null) {
        logger.debug({ command, signal }, 'External tool terminated by signal');
      }
      finish(code ?? SIGNALLED_EXIT_CODE);
    });

    timeoutTimer = setTimeout(() => {
      timedOut = true;
      if (proc.exitCode !== null || proc.signalCode !== null) {
        // Exited, but a descendant still holds stdout or stderr open
        logger.warn({ command, timeoutMs }, 'External tool output still open at timeout');
        finish(proc.exitCode ?? SIGNALLED_EXIT_CODE);
        return;
      }
      logger.warn({ command, timeoutMs }, 'External tool timed out, sending SIGTERM');
      proc.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) {
          logger.warn({ command }, 'External tool ignored SIGTERM, sending SIGKILL');
          proc.kill('SIGKILL');
        }
      }, killGracePeriodMs);
    }, timeoutMs);

    // EPIPE when the child exits before reading its input
    proc.stdin.on('error', (error) => {
      logger.debug({ command, error: error.message }, 'External tool stdin closed early');
    });
    if (input !== undefined) {
      proc.stdin.end(input);
    } else {
      proc.stdin.end();
    }
  });
}

/**
 * Create the process-backed runner used in production.
 *
 * @example
 * ```typescript
 * const runner = createProcessRunner(logger, { killGracePeriodMs: 5000 });
 * const result = await runner.run({
 *   program: 'kubectl',
 *   args: ['--context', 'staging', 'apply', '--dry-run=client', '-f', '-'],
 *   input: manifest,
 *   timeoutMs: 60_000,
 * });
 * ```
 */
export function createProcessRunner(logger: Logger, options: ProcessRunnerOptions = {}): ToolRunner {
  const killGracePeriodMs = options.killGracePeriodMs ?? DEFAULT_TIMEOUTS.killGrace * 1000;
  const maxOutputBytes = options.maxOutputBytes ?? LIMITS.MAX_OUTPUT_BUFFER;

  return {
    run(invocation: ToolInvocation): Promise<ToolInvocationResult> {
      return runProcess(invocation, logger, killGracePeriodMs, maxOutputBytes);
    },
  };
}
