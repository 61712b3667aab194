import type { ToolInput } from '@agent-exec/core';

export const MAX_CODE_BLOCK_LINES = 10;
export const MAX_CODE_BLOCK_CHARS = 5000;
export const HIDDEN_PLACEHOLDER = '<hidden, use --verbose to see>';

/** Tool input fields that are usually whole files and drown out the log. */
const HIDDEN_TOOL_FIELDS: Readonly<Record<string, readonly string[]>> = {
  Write: ['content'],
  Edit: ['new_string', 'old_string'],
};

/**
 * Keeps tool traffic readable in the console. Verbose mode shows everything.
 */
export class ContentFilter {
  constructor(private readonly verbose = false) {}

  /** Copy of `input` with bulky fields replaced by a placeholder. */
  filterToolInput(toolName: string, input: ToolInput): ToolInput {
    if (this.verbose) return input;

    const filtered: ToolInput = { ...input };
    for (const field of HIDDEN_TOOL_FIELDS[toolName] ?? []) {
      if (field in filtered) {
        filtered[field] = HIDDEN_PLACEHOLDER;
      }
    }
    return filtered;
  }

  /** Cap a block at 10 lines, then at 5000 characters. */
  limitCodeBlock(content: string): string {
    if (this.verbose) return content;

    let lines = content.split('\n');
    if (lines.length > MAX_CODE_BLOCK_LINES) {
      const hiddenLines = lines.length - MAX_CODE_BLOCK_LINES;
      lines = [
        ...lines.slice(0, MAX_CODE_BLOCK_LINES),
        `... (${hiddenLines} more lines hidden, use --verbose to see all)`,
      ];
    }

    const result = lines.join('\n');
    if (result.length <= MAX_CODE_BLOCK_CHARS) return result;

    const hiddenChars = content.length - MAX_CODE_BLOCK_CHARS;
    return (
      result.slice(0, MAX_CODE_BLOCK_CHARS) +
      `\n... (${hiddenChars} more characters hidden, use --verbose to see all)`
    );
  }
}
