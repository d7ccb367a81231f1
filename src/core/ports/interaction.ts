/**
 * Interaction Port Interface
 *
 * Defines the contract for the decisions a resolution asks the user for.
 * Core logic uses this interface instead of @clack/prompts directly, so
 * tests can script the answers.
 *
 * Implementations:
 *   - ClackInteractionAdapter (CLI): routes to @clack/prompts
 *   - nonInteractivePrompt (CI/default): throws on prompt attempts
 */

/**
 * One entry of a choice menu. Choosing it runs `action`.
 */
export interface InteractionChoice<T> {
  /** Short key, e.g. 'a' for Abort */
  key: string;
  label: string;
  action: () => T | Promise<T>;
}

/**
 * InteractionPort defines the interactive decision points.
 */
export interface InteractionPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;

  /**
   * Present an ordered menu, run the chosen entry's action and return
   * its result.
   */
  choose<T>(message: string, choices: ReadonlyArray<InteractionChoice<T>>): Promise<T>;
}
