/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Commands use this interface instead of console.log directly.
 *
 * Implementations:
 *   - consoleOutput (default): routes to the process streams
 *   - tests pass a recording port
 */

export interface OutputPort {
  /** Write text exactly as given (generated source, dot, descriptions) */
  write(text: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display an error message */
  error(message: string): void;
}
