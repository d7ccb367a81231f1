/**
 * Output Port Interface
 * 
 * Defines the contract for all user-facing output operations.
 * Core logic uses this interface instead of console.log or @clack/prompts directly.
 * 
 * Implementations:
 *   - ClackOutputAdapter (CLI): routes to @clack/prompts for rich terminal UI
 *   - ConsoleOutputAdapter (default/CI): routes to plain console.log
 */

/**
 * Unified spinner interface that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

/**
 * OutputPort defines all user-facing output operations.
 */
export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
