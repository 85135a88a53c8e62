/**
 * A structured command ready for execution.
 * Recipes never build raw command strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
  readonly cwd?: string;
}
