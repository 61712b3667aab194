import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';

export type ColorStyle = ChalkInstance;

// Basic 16 colours, on whether or not stdout is a terminal
const chalk = new Chalk({ level: 1 });

export const Colors = {
  MAGENTA: chalk.magenta,
  BOLD_RED: chalk.bold.red,
  BOLD_GREEN: chalk.bold.green,
  BOLD_YELLOW: chalk.bold.yellow,
  BOLD_CYAN: chalk.bold.cyan,
} as const satisfies Record<string, ColorStyle>;

/** Apply `style`, or leave the text as it is when there is none. */
export function colorize(text: string, style: ColorStyle | undefined): string {
  return style ? style(text) : text;
}

/** Reverse video on top of `style`, used for the big milestone titles. */
export function reverseVideo(text: string, style: ColorStyle | undefined): string {
  return (style ?? chalk).inverse(text);
}
