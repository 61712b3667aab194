export const CONTENT_INDENT = '    ';
export const DEFAULT_TERMINAL_WIDTH = 80;

/** The parts of an output stream the display needs. `process.stdout` satisfies it. */
export interface OutputStream {
  write(chunk: string): unknown;
  readonly isTTY?: boolean;
  readonly columns?: number;
}

export function terminalWidth(stream: OutputStream): number {
  const { columns } = stream;
  return columns !== undefined && columns > 0 ? columns : DEFAULT_TERMINAL_WIDTH;
}

export function indentContent(content: string, indent = CONTENT_INDENT): string {
  if (content === '') return content;
  return content
    .split('\n')
    .map((line) => indent + line)
    .join('\n');
}

/**
 * Wrap each line to the terminal width, breaking only after a space, comma
 * or hyphen found in the right half of the line. A line with no such break
 * point is kept whole.
 */
export function wrapText(text: string, indent: string, width = DEFAULT_TERMINAL_WIDTH): string {
  if (text === '') return '';

  let available = width - indent.length;
  if (available <= 0) {
    available = DEFAULT_TERMINAL_WIDTH - indent.length;
  }

  const wrapped: string[] = [];
  for (const line of text.split('\n')) {
    if (line.length <= available) {
      wrapped.push(indent + line);
      continue;
    }

    let remaining = line;
    while (remaining.length > 0) {
      if (remaining.length <= available) {
        wrapped.push(indent + remaining);
        break;
      }

      const breakPoint = findBreakPoint(remaining, available);
      if (breakPoint === -1) {
        wrapped.push(indent + remaining);
        break;
      }

      wrapped.push(indent + remaining.slice(0, breakPoint));
      remaining = remaining.slice(breakPoint).replace(/^ +/, '');
    }
  }
  return wrapped.join('\n');
}

function findBreakPoint(line: string, available: number): number {
  const lowerBound = Math.floor(available / 2);
  for (let i = available - 1; i > lowerBound && i < line.length; i--) {
    const ch = line[i];
    if (ch === ' ' || ch === ',' || ch === '-') return i + 1;
  }
  return -1;
}

/** Indented block for preformatted content such as JSON. */
export function formatContent(content: string): string {
  if (content === '') return '';
  return `\n${indentContent(content)}\n`;
}

/** Indented and wrapped block for prose. */
export function formatWrappedContent(content: string, width: number): string {
  if (content === '') return '';
  return `\n${wrapText(content, CONTENT_INDENT, width)}\n`;
}

/** `10.0ms`, `1.5s`, `2m 5s` */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.floor(ms).toFixed(1)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.floor(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

/** Compact elapsed time for the status line: `1h2m3s`, `2m3s`, `3s` */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const s = totalSeconds % 60;
  if (h > 0) return `${h}h${m}m${s}s`;
  if (m > 0) return `${m}m${s}s`;
  return `${s}s`;
}

/** Local wall-clock time as `HH:MM:SS` */
export function formatClockTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
}
