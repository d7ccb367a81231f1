/**
 * Core Ports
 * 
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the resolution logic
 * and external concerns (terminal UI, prompts).
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export type { InteractionPort, InteractionChoice } from './interaction.js';
export { consoleOutput } from './console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './console-prompt.js';
export { resolveOutput, resolveInteraction } from './resolve.js';
