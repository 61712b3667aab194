import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { EvolveConfig, LogLevel } from '@agent-exec/core';
import {
  DEFAULT_COMPARE_ERROR_RETRIES,
  DEFAULT_COMPARE_PROMPT,
  DEFAULT_EVOLVE_ITERATIONS,
  DEFAULT_IMPROVE_PROMPT,
  DEFAULT_LOOP_ITERATIONS,
  InvalidInputError,
  errorMessage,
  isLogLevel,
} from '@agent-exec/core';
import { parseDuration } from './duration.js';

export type CommandName = 'loop' | 'evolve';

export const DEFAULT_CONFIG_FILE = 'agent-exec.config.json';
export const LOG_LEVEL_ENV = 'AGENT_EXEC_LOG_LEVEL';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Zod schema for the JSON config file. Every key is optional; flags win.
const FileConfigSchema = z
  .object({
    iterations: z.number().int().positive().optional(),
    sleep: z.string().optional(),
    verbose: z.boolean().optional(),
    statusLine: z.boolean().optional(),
    logLevel: LogLevelSchema.optional(),

    systemPrompt: z.string().optional(),
    appendSystemPrompt: z.string().optional(),

    improve: z.string().optional(),
    improveSystemPrompt: z.string().optional(),
    appendImproveSystemPrompt: z.string().optional(),

    compare: z.string().optional(),
    compareSystemPrompt: z.string().optional(),
    appendCompareSystemPrompt: z.string().optional(),

    compareErrorRetries: z.number().int().nonnegative().optional(),
    debugKeepBranches: z.boolean().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

const ITERATIONS_MESSAGE = 'iterations must be a positive number';

const AgentExecConfigSchema = z.object({
  iterations: z.number().int(ITERATIONS_MESSAGE).positive(ITERATIONS_MESSAGE),
  sleepMs: z.number().nonnegative(),
  verbose: z.boolean(),
  statusLine: z.boolean(),
  logLevel: LogLevelSchema,

  systemPrompt: z.string(),
  appendSystemPrompt: z.string(),

  improve: z.string(),
  improveSystemPrompt: z.string(),
  appendImproveSystemPrompt: z.string(),

  compare: z.string(),
  compareSystemPrompt: z.string(),
  appendCompareSystemPrompt: z.string(),

  compareErrorRetries: z
    .number()
    .int('compare error retries must be a non-negative integer')
    .nonnegative('compare error retries must be a non-negative integer'),
  debugKeepBranches: z.boolean(),
});

export type AgentExecConfig = z.infer<typeof AgentExecConfigSchema>;

/** Flags as commander hands them over; absent flags stay undefined. */
export interface CliOptions {
  config?: string;
  iterations?: number;
  sleep?: string;
  verbose?: boolean;
  statusLine?: boolean;
  systemPrompt?: string;
  appendSystemPrompt?: string;
  improve?: string;
  improveSystemPrompt?: string;
  appendImproveSystemPrompt?: string;
  compare?: string;
  compareSystemPrompt?: string;
  appendCompareSystemPrompt?: string;
  compareErrorRetries?: number;
  debugKeepBranches?: boolean;
}

export function defaultConfig(command: CommandName): AgentExecConfig {
  return {
    iterations: command === 'loop' ? DEFAULT_LOOP_ITERATIONS : DEFAULT_EVOLVE_ITERATIONS,
    sleepMs: 0,
    verbose: false,
    statusLine: true,
    logLevel: 'warn',
    systemPrompt: '',
    appendSystemPrompt: '',
    improve: DEFAULT_IMPROVE_PROMPT,
    improveSystemPrompt: '',
    appendImproveSystemPrompt: '',
    compare: DEFAULT_COMPARE_PROMPT,
    compareSystemPrompt: '',
    appendCompareSystemPrompt: '',
    compareErrorRetries: DEFAULT_COMPARE_ERROR_RETRIES,
    debugKeepBranches: false,
  };
}

function describeIssues(error: z.ZodError, withPath = true): string {
  return error.issues
    .map((issue) =>
      withPath && issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

/**
 * Load the JSON config file. An explicit path must exist; otherwise
 * `agent-exec.config.json` in `cwd` is used when present.
 */
export function loadConfigFile(configPath: string | undefined, cwd: string): FileConfig | undefined {
  const absolutePath = resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(absolutePath)) {
    if (configPath === undefined) return undefined;
    throw new InvalidInputError(`config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new InvalidInputError(`failed to read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`invalid config file ${absolutePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function resolveLogLevel(
  cliVerbose: boolean | undefined,
  file: FileConfig,
  env: NodeJS.ProcessEnv,
): LogLevel {
  if (cliVerbose) return 'debug';
  const fromEnv = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (file.verbose) return 'debug';
  return file.logLevel ?? 'warn';
}

/**
 * Merge CLI options with the config file and defaults.
 * Priority: CLI options > config file > defaults
 */
export function resolveConfig(
  command: CommandName,
  cli: CliOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): AgentExecConfig {
  const defaults = defaultConfig(command);
  const file = loadConfigFile(cli.config, cwd) ?? {};

  const sleep = cli.sleep ?? file.sleep;

  const merged: AgentExecConfig = {
    iterations: cli.iterations ?? file.iterations ?? defaults.iterations,
    sleepMs: sleep === undefined ? defaults.sleepMs : parseDuration(sleep),
    verbose: cli.verbose ?? file.verbose ?? defaults.verbose,
    statusLine: cli.statusLine ?? file.statusLine ?? defaults.statusLine,
    logLevel: resolveLogLevel(cli.verbose, file, env),

    systemPrompt: cli.systemPrompt ?? file.systemPrompt ?? defaults.systemPrompt,
    appendSystemPrompt: cli.appendSystemPrompt ?? file.appendSystemPrompt ?? defaults.appendSystemPrompt,

    improve: cli.improve ?? file.improve ?? defaults.improve,
    improveSystemPrompt: cli.improveSystemPrompt ?? file.improveSystemPrompt ?? defaults.improveSystemPrompt,
    appendImproveSystemPrompt:
      cli.appendImproveSystemPrompt ?? file.appendImproveSystemPrompt ?? defaults.appendImproveSystemPrompt,

    compare: cli.compare ?? file.compare ?? defaults.compare,
    compareSystemPrompt: cli.compareSystemPrompt ?? file.compareSystemPrompt ?? defaults.compareSystemPrompt,
    appendCompareSystemPrompt:
      cli.appendCompareSystemPrompt ?? file.appendCompareSystemPrompt ?? defaults.appendCompareSystemPrompt,

    compareErrorRetries: cli.compareErrorRetries ?? file.compareErrorRetries ?? defaults.compareErrorRetries,
    debugKeepBranches: cli.debugKeepBranches ?? file.debugKeepBranches ?? defaults.debugKeepBranches,
  };

  // Final validation
  const parsed = AgentExecConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidInputError(describeIssues(parsed.error, false));
  }
  return parsed.data;
}

/** Tournament settings from a resolved config. */
export function toEvolveConfig(plan: string, config: AgentExecConfig): EvolveConfig {
  return {
    plan,
    improvePrompt: config.improve,
    comparePrompt: config.compare,
    iterations: config.iterations,
    sleepMs: config.sleepMs,
    compareErrorRetries: config.compareErrorRetries,
    debugKeepBranches: config.debugKeepBranches,
    planOptions: { systemPrompt: config.systemPrompt, appendSystemPrompt: config.appendSystemPrompt },
    improveOptions: {
      systemPrompt: config.improveSystemPrompt,
      appendSystemPrompt: config.appendImproveSystemPrompt,
    },
    compareOptions: {
      systemPrompt: config.compareSystemPrompt,
      appendSystemPrompt: config.appendCompareSystemPrompt,
    },
  };
}
