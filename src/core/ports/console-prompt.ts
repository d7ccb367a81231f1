/**
 * Non-Interactive Prompt Adapter (Default/CI)
 * 
 * InteractionPort implementation that throws on any prompt attempt.
 * Used in CI/CD pipelines and headless environments where
 * user interaction is not possible.
 */

import type { InteractionPort, InteractionChoice } from './interaction.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string, message: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode ("${message}"). ` +
      `Set DATADEPS_ALWAYS_ACCEPT or pass --yes to accept downloads without prompting.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: InteractionPort = {
  async confirm(message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation', message);
  },

  async choose<T>(message: string, _choices: ReadonlyArray<InteractionChoice<T>>): Promise<T> {
    throw new NonInteractivePromptError('a choice', message);
  },
};
