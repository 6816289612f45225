/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Pipelines use this interface instead of console.log directly.
 *
 * Implementations:
 *   - createPlainOutput (CLI): console output with an ora spinner
 *   - consoleOutput (default): plain console.log
 *   - test doubles that record lines
 */

/**
 * Unified spinner interface that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a plain message, verbatim (used for result lines) */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
