import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@agent-exec/core';
import { parseDuration } from '../duration.js';

describe('parseDuration', () => {
  it('accepts a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
  });

  it('parses single units', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('1.5m')).toBe(90_000);
    expect(parseDuration('2h')).toBe(7_200_000);
    expect(parseDuration('500us')).toBeCloseTo(0.5);
  });

  it('adds up compound durations', () => {
    expect(parseDuration('2h30m')).toBe(9_000_000);
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1s500ms')).toBe(1_500);
  });

  it('rejects numbers without a unit', () => {
    expect(() => parseDuration('30')).toThrow('invalid duration "30"');
  });

  it('rejects anything else', () => {
    for (const text of ['soon', '-5s', '1x', '5m later', '']) {
      expect(() => parseDuration(text)).toThrow(InvalidInputError);
    }
  });
});
