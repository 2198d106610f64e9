/**
 * Cluster Context Store
 *
 * Holds the one cluster context every cluster-facing validation targets.
 * Selection lives only in memory: it is handed to each tool invocation as an
 * explicit `--context` / `--kube-context` flag and kubeconfig is never
 * written.
 */

import type { Logger } from 'pino';
import { Success, type Result } from '@/types';
import { ERROR_MESSAGES } from '@/lib/errors';
import { kubectl, type KubectlCli } from '@/infra/cli/kubectl';
import type { ToolRunner } from '@/infra/process/runner';
import { classifiedFailure, classifyInvocation, describeInvocationFailure } from '@/validation/classifier';

export type ContextSelection = { selected: true; name: string } | { selected: false };

export const UNSELECTED: ContextSelection = Object.freeze({ selected: false });

export interface AvailableContexts {
  /** Context names from kubeconfig, in kubeconfig order */
  contexts: string[];
  /** kubeconfig's own current-context, or null when none is set */
  cliCurrent: string | null;
}

export interface ContextStore {
  /**
   * Replace the selection. Accepts any non-empty name; checking the name
   * against kubeconfig is the caller's job.
   *
   * @returns the selection it replaced
   */
  select(name: string): ContextSelection;
  current(): ContextSelection;
  listAvailable(): Promise<Result<AvailableContexts>>;
}

export interface ContextStoreOptions {
  runner: ToolRunner;
  logger: Logger;
  /** Per-call limit for the kubeconfig queries */
  timeoutMs: number;
  kubectlCli?: KubectlCli;
  initial?: ContextSelection;
}

export function createContextStore(options: ContextStoreOptions): ContextStore {
  const { runner, logger, timeoutMs } = options;
  const cli = options.kubectlCli ?? kubectl;
  let selection: ContextSelection = options.initial ?? UNSELECTED;

  return {
    select(name: string): ContextSelection {
      if (name.trim() === '') {
        throw new TypeError('Context name must be a non-empty string');
      }
      const previous = selection;
      selection = Object.freeze({ selected: true, name });
      logger.info(
        { context: name, previous: previous.selected ? previous.name : null },
        'Cluster context selected',
      );
      return previous;
    },

    current(): ContextSelection {
      return selection;
    },

    async listAvailable(): Promise<Result<AvailableContexts>> {
      const listed = await runner.run({ ...cli.listContexts(), timeoutMs });
      const kind = classifyInvocation(listed);
      if (kind !== null) {
        return classifiedFailure(kind, `Failed to list contexts: ${describeInvocationFailure(listed)}`, {
          command: listed.command,
        });
      }

      const contexts = listed.stdout
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

      // Exits non-zero when kubeconfig has no current-context
      const current = await runner.run({ ...cli.currentContext(), timeoutMs });
      const cliCurrent =
        classifyInvocation(current) === null && current.stdout.trim() !== ''
          ? current.stdout.trim()
          : null;

      logger.debug({ count: contexts.length, cliCurrent }, 'Listed kubeconfig contexts');
      return Success({ contexts, cliCurrent });
    },
  };
}

/**
 * Name of the selected context, or an `Unselected` failure
 */
export function requireContext(store: ContextStore): Result<string> {
  const selection = store.current();
  if (!selection.selected) {
    return classifiedFailure('Unselected', ERROR_MESSAGES.NO_CONTEXT_SELECTED);
  }
  return Success(selection.name);
}

export function selectionName(selection: ContextSelection): string | null {
  return selection.selected ? selection.name : null;
}
