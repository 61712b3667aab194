/** Capacity of the event bus buffer */
export const EVENT_BUFFER_SIZE = 100;

/** Longest stdout line accepted from the assistant (10 MiB) */
export const MAX_STREAM_LINE_LENGTH = 10 * 1024 * 1024;

export const BRANCH_PREFIX = 'impl-';

export const DEFAULT_IMPROVE_PROMPT = 'improve the code quality and fix any issues';
export const DEFAULT_COMPARE_PROMPT = 'compare these two implementations and determine which is worse';
export const DEFAULT_LOOP_ITERATIONS = 1;
export const DEFAULT_EVOLVE_ITERATIONS = 3;
export const DEFAULT_COMPARE_ERROR_RETRIES = 3;

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  INTERRUPTED: 130,
} as const;
