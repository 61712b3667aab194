import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_COMPARE_PROMPT, DEFAULT_IMPROVE_PROMPT } from '@agent-exec/core';
import type { CliOptions } from './config.js';

export interface CommandActions {
  loop(prompt: string, options: CliOptions): Promise<void>;
  evolve(prompt: string, options: CliOptions): Promise<void>;
}

export interface ProgramSettings {
  /** Throw a CommanderError instead of exiting the process */
  exitOverride?: boolean;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

const INTEGER = /^-?\d+$/;

/** Plain decimal integers only; `1e3`, `0x10` and padded values are refused. */
function parseInteger(value: string): number {
  if (!INTEGER.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

function addCommonOptions(command: Command, defaultIterations: number): Command {
  return command
    .option('-n, --iterations <n>', `number of runs (default: ${defaultIterations})`, parseInteger)
    .option('-s, --sleep <duration>', 'pause between runs, e.g. 30s, 1.5m, 2h30m (default: 0)')
    .option('--system-prompt <text>', 'replace the entire system prompt')
    .option('--append-system-prompt <text>', 'append to the default system prompt')
    .option('-v, --verbose', 'show full tool inputs and results, and debug logs')
    .option('--status-line', 'show the status block at the bottom of the terminal (default)')
    .option('--no-status-line', 'hide the status block')
    .option('--config <path>', 'JSON file with default option values');
}

/**
 * The `agent-exec` command tree. Actions receive the raw flags; resolving
 * them against the config file happens in the action.
 */
export function createProgram(actions: CommandActions, settings: ProgramSettings = {}): Command {
  const program = new Command();

  if (settings.exitOverride) program.exitOverride();
  if (settings.writeOut || settings.writeErr) {
    program.configureOutput({
      ...(settings.writeOut ? { writeOut: settings.writeOut } : {}),
      ...(settings.writeErr ? { writeErr: settings.writeErr } : {}),
    });
  }

  program
    .name('agent-exec')
    .description('Automated iterative improvement with Claude Code, trading time and tokens for better results')
    .version('0.1.0');

  const loop = program
    .command('loop')
    .description('Run the same prompt multiple times')
    .argument('<prompt>', 'prompt to run');
  addCommonOptions(loop, 1)
    .addHelpText('after', '\nExample:\n  agent-exec loop "improve code quality" -n 5 -s 30s')
    .action((prompt: string, options: CliOptions) => actions.loop(prompt, options));

  const evolve = program
    .command('evolve')
    .description('Tournament-style code evolution using git branches')
    .argument('<prompt>', 'prompt for the initial implementation');
  addCommonOptions(evolve, 3)
    .option('-i, --improve <prompt>', `prompt for improved challengers (default: "${DEFAULT_IMPROVE_PROMPT}")`)
    .option('--improve-system-prompt <text>', 'replace the system prompt for improvement steps')
    .option('--append-improve-system-prompt <text>', 'append to the system prompt for improvement steps')
    .option('-c, --compare <prompt>', `prompt for judging (default: "${DEFAULT_COMPARE_PROMPT}")`)
    .option('--compare-system-prompt <text>', 'replace the system prompt for comparison steps')
    .option('--append-compare-system-prompt <text>', 'append to the system prompt for comparison steps')
    .option('--compare-error-retries <n>', 'extra judge attempts when no branch is named (default: 3)', parseInteger)
    .option('--debug-keep-branches', 'keep eliminated branches instead of deleting them')
    .addHelpText(
      'after',
      [
        '',
        'Each round branches a challenger off the current winner, improves it,',
        'then asks Claude which of the two to delete.',
        '',
        'Example:',
        '  agent-exec evolve "implement a snake game" -n 3',
      ].join('\n'),
    )
    .action((prompt: string, options: CliOptions) => actions.evolve(prompt, options));

  return program;
}
