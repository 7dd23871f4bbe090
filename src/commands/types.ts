/**
 * Outcome of a CLI command: whether it succeeded and the text to print.
 */
export interface CommandResult {
  success: boolean;
  message: string;
}
