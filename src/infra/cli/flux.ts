import type { CliCommand } from './types';

/**
 * Argument builders for the flux CLI
 */
export interface FluxCli {
  readonly program: string;
  /** Controller and prerequisite health */
  check(context: string): CliCommand;
  /** Every Flux object in every namespace, as tables */
  getAll(context: string): CliCommand;
  version(): CliCommand;
}

export function createFluxCli(program = 'flux'): FluxCli {
  return {
    program,
    check: (context) => ({ program, args: ['--context', context, 'check'] }),
    getAll: (context) => ({ program, args: ['--context', context, 'get', 'all', '-A'] }),
    version: () => ({ program, args: ['version', '--client'] }),
  };
}

export const flux = createFluxCli();
