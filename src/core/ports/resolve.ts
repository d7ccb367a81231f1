/**
 * Port Resolution Helpers
 * 
 * Utilities for resolving OutputPort and InteractionPort from a context,
 * falling back to safe defaults when ports are not explicitly provided.
 */

import type { OutputPort } from './output.js';
import type { InteractionPort } from './interaction.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

/**
 * Resolve the OutputPort from a context.
 * Falls back to consoleOutput (plain console.log) if not provided.
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/**
 * Resolve the InteractionPort from a context.
 * Falls back to nonInteractivePrompt (throws on any prompt) if not provided.
 */
export function resolveInteraction(ctx?: { interaction?: InteractionPort }): InteractionPort {
  return ctx?.interaction ?? nonInteractivePrompt;
}
