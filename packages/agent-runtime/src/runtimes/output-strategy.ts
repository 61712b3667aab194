/**
 * @fileoverview OutputStrategy - framing of child process stdout.
 *
 * The runtime feeds raw stdout chunks in and gets complete records out, so
 * the parsing layer never sees a partial line.
 *
 * Design Patterns:
 * - Strategy Pattern: the runtime picks its framing via `createOutputStrategy()`
 * - Template Method: processChunk() + flush() lifecycle
 *
 * @module agent-runtime/runtimes/output-strategy
 */

import { MAX_STREAM_LINE_LENGTH, ProtocolParseError } from '@agent-exec/core';

/**
 * Strategy interface for framing child process stdout.
 *
 * @interface
 */
export interface OutputStrategy {
  /**
   * Processes a raw stdout chunk and returns the records it completed.
   *
   * @param chunk - The raw stdout chunk
   */
  processChunk(chunk: string): string[];

  /**
   * Returns whatever is still buffered once stdout has ended.
   */
  flush(): string[];
}

/**
 * Line-buffered strategy for runtimes that output stream-json (JSONL).
 *
 * Chunks are buffered by newline. Blank lines are skipped. A line that grows
 * past `maxLineLength` without a newline is a protocol error.
 *
 * @class
 *
 * @example
 * ```typescript
 * const strategy = new JsonlOutputStrategy();
 * strategy.processChunk('{"type":"res');        // []
 * strategy.processChunk('ult"}\n{"type":"x"}'); // ['{"type":"result"}']
 * strategy.flush();                              // ['{"type":"x"}']
 * ```
 */
export class JsonlOutputStrategy implements OutputStrategy {
  /** Buffer for the incomplete trailing line */
  private lineBuf = '';

  constructor(private readonly maxLineLength = MAX_STREAM_LINE_LENGTH) {}

  processChunk(chunk: string): string[] {
    this.lineBuf += chunk;
    const lines = this.lineBuf.split('\n');
    this.lineBuf = lines.pop() ?? '';

    if (this.lineBuf.length > this.maxLineLength) {
      throw new ProtocolParseError(
        `stream-json line exceeds ${this.maxLineLength} characters`,
        this.lineBuf.slice(0, 200),
      );
    }

    return this.complete(lines);
  }

  flush(): string[] {
    const rest = this.lineBuf;
    this.lineBuf = '';
    return this.complete([rest]);
  }

  private complete(lines: string[]): string[] {
    const out: string[] = [];
    for (const line of lines) {
      if (!line.trim()) continue;
      if (line.length > this.maxLineLength) {
        throw new ProtocolParseError(
          `stream-json line exceeds ${this.maxLineLength} characters`,
          line.slice(0, 200),
        );
      }
      out.push(line);
    }
    return out;
  }
}
