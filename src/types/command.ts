/**
 * A structured command ready for execution.
 * Operation handlers never build raw shell strings: they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
}
