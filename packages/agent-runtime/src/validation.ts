import { InvalidInputError } from '@agent-exec/core';

export function validatePrompt(prompt: string): void {
  if (prompt === '') {
    throw new InvalidInputError('prompt cannot be empty');
  }
  if (prompt.trim() === '') {
    throw new InvalidInputError('prompt cannot be whitespace-only');
  }
}

export function validateIterations(iterations: number): void {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidInputError('iterations must be a positive number');
  }
}
