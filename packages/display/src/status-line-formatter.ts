import path from 'node:path';
import type { AgentEvent } from '@agent-exec/core';
import { Events, isEvent } from '@agent-exec/core';
import type { Formatter } from './formatter.js';
import { DEFAULT_TERMINAL_WIDTH, formatElapsed } from './text.js';
import type { OutputStream } from './text.js';

const STATUS_LINES = 4;
const MAX_PROMPT_PREVIEW = 80;

export interface StatusLineOptions {
  stream: OutputStream;
  enabled?: boolean;
  /** Initial working directory; replaced by the next `run-started` */
  cwd?: string;
  baseUrl?: string;
  /** Clock for the elapsed time, in milliseconds */
  now?: () => number;
}

/**
 * Decorator that pins a four-line status block below the event log:
 * progress, directory, branch and elapsed time, then the base URL, then a
 * preview of the prompt. The block is erased before each event is written
 * and redrawn after it, so it always sits at the bottom of the terminal.
 *
 * Only active on a TTY.
 */
export class StatusLineFormatter implements Formatter {
  private readonly stream: OutputStream;
  private readonly enabled: boolean;
  private readonly width: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly baseUrl: string;

  private visible = false;
  private progress = 0;
  private total = 0;
  private evolve = false;
  private cwd: string;
  private branch = '';
  private prompt = '';

  constructor(
    private readonly wrapped: Formatter,
    options: StatusLineOptions,
  ) {
    this.stream = options.stream;
    this.enabled = (options.enabled ?? true) && options.stream.isTTY === true;
    const columns = options.stream.columns;
    this.width = columns !== undefined && columns > 0 ? columns : DEFAULT_TERMINAL_WIDTH;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.cwd = options.cwd ?? '';
    this.baseUrl = options.baseUrl ?? '';
  }

  get active(): boolean {
    return this.enabled;
  }

  format(event: AgentEvent): void {
    this.updateState(event);
    this.clear();
    this.wrapped.format(event);
    this.draw();
  }

  flush(): void {
    this.clear();
    this.wrapped.flush();
  }

  /** The block as it would be drawn now, before truncation. */
  buildLines(): string[] {
    const parts: string[] = [];
    if (this.progress > 0 && this.total > 0) {
      parts.push(`${this.evolve ? 'Round' : 'Iter'} ${this.progress}/${this.total}`);
    }
    if (this.cwd) parts.push(`CWD: ${path.basename(this.cwd)}`);
    if (this.branch) parts.push(`Git Branch: ${this.branch}`);
    parts.push(`Time: ${formatElapsed(this.now() - this.startedAt)}`);

    return [
      '',
      parts.join(', '),
      this.baseUrl ? `Base URL: ${this.baseUrl}` : '',
      this.prompt ? `Prompt: "${previewPrompt(this.prompt)}"` : '',
    ];
  }

  private updateState(event: AgentEvent): void {
    if (isEvent(event, Events.RUN_STARTED)) {
      this.cwd = event.payload.cwd;
      this.prompt = event.payload.prompt;
    } else if (isEvent(event, Events.ITERATION_STARTED)) {
      this.progress = event.payload.current;
      this.total = event.payload.total;
      this.evolve = false;
    } else if (isEvent(event, Events.ROUND_STARTED)) {
      this.progress = event.payload.round;
      this.total = event.payload.total;
      this.evolve = true;
    } else if (isEvent(event, Events.BRANCH_CREATED) || isEvent(event, Events.BRANCH_CHECKED_OUT)) {
      this.branch = event.payload.name;
    }
  }

  private draw(): void {
    if (!this.enabled) return;
    for (const line of this.buildLines()) {
      this.stream.write(`${this.truncate(line)}\n`);
    }
    this.visible = true;
  }

  private clear(): void {
    if (!this.visible) return;
    // Cursor to the top of the block, erase each line, then back up again.
    let out = `\x1b[${STATUS_LINES}A`;
    for (let i = 0; i < STATUS_LINES; i++) {
      out += '\r\x1b[K';
      if (i < STATUS_LINES - 1) out += '\n';
    }
    out += `\r\x1b[${STATUS_LINES - 1}A`;
    this.stream.write(out);
    this.visible = false;
  }

  private truncate(line: string): string {
    if (line.length <= this.width) return line;
    return this.width > 3 ? `${line.slice(0, this.width - 3)}...` : line.slice(0, this.width);
  }
}

function previewPrompt(prompt: string): string {
  const escaped = prompt.replaceAll('\n', '\\n').replaceAll('\r', '\\r').replaceAll('\t', '\\t');
  return escaped.length > MAX_PROMPT_PREVIEW ? `${escaped.slice(0, MAX_PROMPT_PREVIEW)}...` : escaped;
}
