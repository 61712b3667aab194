import type { PromptOptions } from './prompt.js';

export interface EvolveConfig {
  /** Prompt for the initial implementation */
  plan: string;
  improvePrompt: string;
  comparePrompt: string;
  iterations: number;
  sleepMs: number;
  /** Extra judge attempts after the first one fails to parse */
  compareErrorRetries: number;
  /** Keep eliminated branches instead of force-deleting them */
  debugKeepBranches: boolean;
  planOptions: PromptOptions;
  improveOptions: PromptOptions;
  compareOptions: PromptOptions;
}

export interface EvolveResult {
  finalBranch: string;
  rounds: number;
}

export interface LoopSummary {
  total: number;
  successful: number;
  failed: number;
}
