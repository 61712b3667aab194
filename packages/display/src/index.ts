export { Colors, colorize, reverseVideo } from './colors.js';
export type { ColorStyle } from './colors.js';
export {
  CONTENT_INDENT,
  DEFAULT_TERMINAL_WIDTH,
  terminalWidth,
  indentContent,
  wrapText,
  formatContent,
  formatWrappedContent,
  formatDuration,
  formatElapsed,
  formatClockTime,
} from './text.js';
export type { OutputStream } from './text.js';
export {
  ContentFilter,
  HIDDEN_PLACEHOLDER,
  MAX_CODE_BLOCK_CHARS,
  MAX_CODE_BLOCK_LINES,
} from './content-filter.js';
export { EVENT_COLORS, EVENT_RENDERERS } from './event-renderers.js';
export type { EventRenderer, EventRenderers, RenderContext } from './event-renderers.js';
export type { Formatter } from './formatter.js';
export { ConsoleFormatter } from './console-formatter.js';
export type { ConsoleFormatterOptions } from './console-formatter.js';
export { StatusLineFormatter } from './status-line-formatter.js';
export type { StatusLineOptions } from './status-line-formatter.js';
export { Display } from './display.js';
