import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@agent-exec/core';
import { validateIterations, validatePrompt } from '../validation.js';

describe('validatePrompt', () => {
  it('accepts text with surrounding whitespace', () => {
    expect(() => validatePrompt('  fix the tests  ')).not.toThrow();
  });

  it('rejects empty and whitespace-only prompts', () => {
    expect(() => validatePrompt('')).toThrow(new InvalidInputError('prompt cannot be empty'));
    expect(() => validatePrompt('\n  ')).toThrow(new InvalidInputError('prompt cannot be whitespace-only'));
  });
});

describe('validateIterations', () => {
  it('accepts positive integers', () => {
    expect(() => validateIterations(1)).not.toThrow();
    expect(() => validateIterations(25)).not.toThrow();
  });

  it.each([0, -3, 1.5, Number.NaN])('rejects %s', (value) => {
    expect(() => validateIterations(value)).toThrow('iterations must be a positive number');
  });
});
