/**
 * Clack Interaction Adapter
 * 
 * CLI-specific InteractionPort implementation that routes to @clack/prompts
 * for rich interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { InteractionPort, InteractionChoice } from '../core/ports/interaction.js';
import { UserCancellationError } from '../utils/errors.js';

function cancelled(): never {
  clack.cancel('Operation cancelled.');
  throw new UserCancellationError('Operation cancelled by user');
}

/**
 * Create a Clack-based InteractionPort for interactive terminal sessions.
 */
export function createClackInteraction(): InteractionPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      if (clack.isCancel(result)) {
        return cancelled();
      }
      return result;
    },

    async choose<T>(message: string, choices: ReadonlyArray<InteractionChoice<T>>): Promise<T> {
      const key = await clack.select<string>({
        message,
        options: choices.map(c => ({
          value: c.key,
          label: c.label,
          hint: c.key,
        })),
      });
      if (clack.isCancel(key)) {
        return cancelled();
      }

      const choice = choices.find(c => c.key === key);
      if (!choice) {
        throw new Error(`Unknown choice '${key}'`);
      }
      return choice.action();
    },
  };
}
