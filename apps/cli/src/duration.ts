import { InvalidInputError } from '@agent-exec/core';

const UNIT_MS: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

// Longer units first so `ms` is not read as `m` followed by garbage.
const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parse a duration such as `2h30m`, `30s`, `1.5m` or `250ms` into
 * milliseconds. A bare `0` is allowed; any other number needs a unit.
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === '0') return 0;
  if (input === '') {
    throw new InvalidInputError('invalid duration ""');
  }

  let total = 0;
  let offset = 0;
  while (offset < input.length) {
    SEGMENT.lastIndex = offset;
    const match = SEGMENT.exec(input);
    if (!match) {
      throw new InvalidInputError(`invalid duration "${text}"`);
    }
    const [, amount = '', unit = ''] = match;
    total += Number(amount) * (UNIT_MS[unit] ?? 0);
    offset = SEGMENT.lastIndex;
  }
  return total;
}
