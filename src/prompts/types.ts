/**
 * Prompt management types.
 * Prompts are versioned so responses can be traced to the wording that produced them.
 */

export interface PromptDefinition<TInput = unknown> {
  /** Unique identifier for this prompt (used in logs) */
  id: string;

  /** Incremented on any wording change */
  version: number;

  /** Default target model; callers may override */
  model: string;

  /** Human-readable description of what this prompt does */
  description: string;

  /** Function that builds the prompt string from input */
  build: (input: TInput) => string;
}
