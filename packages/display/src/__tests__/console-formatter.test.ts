import { describe, it, expect } from 'vitest';
import { ConsoleFormatter } from '../console-formatter.js';
import { MemoryStream, makeEvent } from './helpers.js';

const magenta = (text: string) => `\x1b[35m${text}\x1b[39m`;
const bold = (code: number, text: string) => `\x1b[1m\x1b[${code}m${text}\x1b[39m\x1b[22m`;
const boldReverse = (code: number, text: string) =>
  `\x1b[1m\x1b[${code}m\x1b[7m${text}\x1b[27m\x1b[39m\x1b[22m`;

const RED = 31;
const GREEN = 32;
const YELLOW = 33;
const CYAN = 36;

function setup(verbose = false) {
  const stream = new MemoryStream();
  const formatter = new ConsoleFormatter({ stream, verbose, width: 80 });
  return { stream, formatter };
}

describe('ConsoleFormatter', () => {
  it('writes each event as a block after a blank line', () => {
    const { stream, formatter } = setup();

    formatter.format(makeEvent('assistant-text', { text: 'hello' }));

    expect(stream.output).toBe(`\n${magenta('💬 [09:05:07] hello')}\n`);
  });

  it('re-opens the colour on every line of multi-line text', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('assistant-text', { text: 'one\ntwo' }))).toBe(
      `${magenta('💬 [09:05:07] one')}\n${magenta('two')}`,
    );
  });

  it('renders the run header with its metadata', () => {
    const { formatter } = setup();

    const output = formatter.render(
      makeEvent('run-started', {
        prompt: 'write hello',
        cwd: '/work/project',
        baseUrl: 'http://localhost:8080',
        fileList: '[README.md, src]',
      }),
    );

    expect(output).toBe(
      `${bold(CYAN, '🚀 Run Prompt Started')}\n    write hello\n` +
        '    🌐 Base URL: http://localhost:8080\n' +
        '    📁 Working Directory: /work/project\n' +
        '    📄 File List: [README.md, src]\n',
    );
  });

  it('omits metadata that is not set', () => {
    const { formatter } = setup();

    const output = formatter.render(makeEvent('run-started', { prompt: 'p', cwd: '/w' }));

    expect(output).toBe(`${bold(CYAN, '🚀 Run Prompt Started')}\n    p\n    📁 Working Directory: /w\n`);
  });

  it('pretty-prints tool input with bulky fields hidden', () => {
    const { formatter } = setup();

    const output = formatter.render(
      makeEvent('tool-use', { name: 'Write', input: { file_path: 'a.ts', content: 'export {};' } }),
    );

    expect(output).toBe(
      '🔧 [09:05:07] Tool: Write\n' +
        '    {\n' +
        '      "file_path": "a.ts",\n' +
        '      "content": "<hidden, use --verbose to see>"\n' +
        '    }\n',
    );
  });

  it('shows full tool input when verbose', () => {
    const { formatter } = setup(true);

    const output = formatter.render(
      makeEvent('tool-use', { name: 'Write', input: { content: 'export {};' } }),
    );

    expect(output).toContain('"content": "export {};"');
  });

  it('limits tool results', () => {
    const { formatter } = setup();
    const content = Array.from({ length: 11 }, (_, i) => `${i}`).join('\n');

    const output = formatter.render(makeEvent('tool-result', { content }));

    expect(output).toBe(
      '📋 [09:05:07] Tool Result\n' +
        '    0\n    1\n    2\n    3\n    4\n    5\n    6\n    7\n    8\n    9\n' +
        '    ... (1 more lines hidden, use --verbose to see all)\n',
    );
  });

  it('renders an empty tool result as just the title', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('tool-result', { content: '' }))).toBe('📋 [09:05:07] Tool Result');
  });

  it('renders loop milestones in reverse video', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('loop-started', { total: 3 }))).toBe(
      `${boldReverse(YELLOW, '🔄 Loop Started')}\n    🔢 Iterations: 3`,
    );
    expect(formatter.render(makeEvent('iteration-completed', { current: 1, total: 3, durationMs: 1500 }))).toBe(
      boldReverse(GREEN, '✅ [09:05:07] Iteration 1/3 completed in 1.5s'),
    );
    expect(formatter.render(makeEvent('iteration-failed', { current: 2, total: 3, error: '' }))).toBe(
      boldReverse(RED, '❌ [09:05:07] Iteration 2/3 failed: unknown error'),
    );
    expect(
      formatter.render(
        makeEvent('loop-completed', { total: 3, successful: 2, failed: 1, totalDurationMs: 0 }),
      ),
    ).toBe(boldReverse(GREEN, '🏁 Loop completed: 2/3 successful, 1 failed (Total: 0.0ms)'));
    expect(formatter.render(makeEvent('loop-interrupted', { completed: 1, total: 3 }))).toBe(
      boldReverse(RED, '⚠️ Loop interrupted: 1/3 iterations completed'),
    );
  });

  it('renders tournament progress', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('round-started', { round: 2, total: 3 }))).toBe(
      boldReverse(YELLOW, '🎯 Round 2/3'),
    );
    expect(
      formatter.render(makeEvent('comparison-started', { winner: 'impl-aaaaaa', challenger: 'impl-bbbbbb' })),
    ).toBe(bold(YELLOW, '⚖️ [09:05:07] Comparing: impl-aaaaaa vs impl-bbbbbb'));
    expect(formatter.render(makeEvent('comparison-retry', { attempt: 1, maxAttempts: 3 }))).toBe(
      magenta('🔁 [09:05:07] Comparison retry 1/3'),
    );
    expect(
      formatter.render(makeEvent('winner-selected', { winner: 'impl-bbbbbb', loser: 'impl-aaaaaa' })),
    ).toBe(bold(GREEN, '🏆 [09:05:07] Winner: impl-bbbbbb (eliminated: impl-aaaaaa)'));
    expect(
      formatter.render(makeEvent('evolve-interrupted', { completed: 0, total: 3, winner: '' })),
    ).toBe(boldReverse(RED, '🛑 Evolution interrupted: 0/3 rounds completed'));
  });

  it('mentions the base of a new branch only when there is one', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('branch-created', { name: 'impl-aaaaaa', base: '' }))).toBe(
      magenta('🌿 [09:05:07] Branch created: impl-aaaaaa'),
    );
    expect(formatter.render(makeEvent('branch-created', { name: 'impl-bbbbbb', base: 'impl-aaaaaa' }))).toBe(
      magenta('🌿 [09:05:07] Branch created: impl-bbbbbb (from impl-aaaaaa)'),
    );
  });

  it('renders timings without a clock prefix', () => {
    const { formatter } = setup();

    expect(formatter.render(makeEvent('execution-result', { durationMs: 250 }))).toBe(
      bold(GREEN, '⏱️ Execution completed in 250.0ms'),
    );
    expect(formatter.render(makeEvent('sleep-started', { durationMs: 90_000 }))).toBe(
      bold(YELLOW, '💤 [09:05:07] Sleeping for 1m 30s'),
    );
  });
});
