/**
 * A program plus the argument vector for one operation. Combined with a
 * timeout (and optionally stdin) it becomes a ToolInvocation.
 */
export interface CliCommand {
  program: string;
  args: string[];
}
