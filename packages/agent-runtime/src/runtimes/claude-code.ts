import type { ExecutionOptions, RuntimeMetadata } from '@agent-exec/core';
import { BaseAgentRuntime } from './base-runtime.js';
import type { StreamLineHandler } from './base-runtime.js';
import { StreamEventHandler } from './jsonl-parser.js';
import { JsonlOutputStrategy } from './output-strategy.js';
import type { OutputStrategy } from './output-strategy.js';

export class ClaudeCodeRuntime extends BaseAgentRuntime {
  readonly runtimeId = 'claude-code';

  readonly metadata: RuntimeMetadata = {
    id: 'claude-code',
    displayName: 'Claude Code',
    cliCommand: 'claude',
    installHint: 'npm install -g @anthropic-ai/claude-code',
  };

  protected getCommand(): string {
    return this.metadata.cliCommand;
  }

  protected buildExecuteArgs(prompt: string, options: ExecutionOptions): string[] {
    const args = ['--verbose', '--output-format', 'stream-json', '-p', prompt];

    if (options.systemPrompt) {
      args.push('--system-prompt', options.systemPrompt);
    }
    if (options.appendSystemPrompt) {
      args.push('--append-system-prompt', options.appendSystemPrompt);
    }

    return args;
  }

  protected createOutputStrategy(): OutputStrategy {
    return new JsonlOutputStrategy();
  }

  protected createLineHandler(): StreamLineHandler {
    return new StreamEventHandler(this.emitter);
  }
}
