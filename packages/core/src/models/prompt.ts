/** Options that shape one assistant invocation. Empty strings are treated as absent. */
export interface PromptOptions {
  /** Replaces the assistant's system prompt */
  systemPrompt?: string;
  /** Appended to the assistant's system prompt */
  appendSystemPrompt?: string;
}
