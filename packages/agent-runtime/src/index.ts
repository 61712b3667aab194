export { BaseAgentRuntime } from './runtimes/base-runtime.js';
export type { RuntimeOptions, SpawnedChild, StreamLineHandler } from './runtimes/base-runtime.js';
export { ClaudeCodeRuntime } from './runtimes/claude-code.js';
export { JsonlOutputStrategy } from './runtimes/output-strategy.js';
export type { OutputStrategy } from './runtimes/output-strategy.js';
export { StreamEventHandler, parseStreamFrame, contentToString } from './runtimes/jsonl-parser.js';
export type { StreamFrame } from './runtimes/jsonl-parser.js';
export { validatePrompt, validateIterations } from './validation.js';
export { describeWorkingDirectory } from './utils.js';
