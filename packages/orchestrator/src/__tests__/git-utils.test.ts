import { describe, it, expect, vi, beforeEach } from 'vitest';
import { VcsError } from '@agent-exec/core';

interface ExecOutcome {
  error: Error | null;
  stdout: string;
  stderr: string;
}

const outcome = vi.hoisted(() => {
  const state: ExecOutcome = { error: null, stdout: '', stderr: '' };
  return state;
});

vi.mock('node:child_process', () => ({
  execFile: vi.fn(
    (
      _file: string,
      _args: string[],
      _options: unknown,
      callback: (error: Error | null, stdout: string, stderr: string) => void,
    ) => {
      callback(outcome.error, outcome.stdout, outcome.stderr);
    },
  ),
}));

const { execFile } = await import('node:child_process');
const { GitClient, runGit } = await import('../git-utils.js');
const { FakeGit, RecordingEmitter } = await import('./fakes.js');

describe('runGit', () => {
  beforeEach(() => {
    outcome.error = null;
    outcome.stdout = '';
    outcome.stderr = '';
    vi.mocked(execFile).mockClear();
  });

  it('runs git in the repository and trims stdout', async () => {
    outcome.stdout = 'feature\n';

    await expect(runGit('/repo', ['rev-parse', '--abbrev-ref', 'HEAD'])).resolves.toBe('feature');
    expect(execFile).toHaveBeenCalledWith(
      'git',
      ['rev-parse', '--abbrev-ref', 'HEAD'],
      expect.objectContaining({ cwd: '/repo' }),
      expect.any(Function),
    );
  });

  it('rejects with the combined output on failure', async () => {
    outcome.error = new Error('Command failed');
    outcome.stdout = 'partial\n';
    outcome.stderr = "fatal: a branch named 'x' already exists\n";

    const error = await runGit('/repo', ['checkout', '-b', 'x']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(VcsError);
    expect(error).toMatchObject({
      message: "git checkout -b x failed: partial\nfatal: a branch named 'x' already exists",
      kind: 'vcs-failure',
      command: ['checkout', '-b', 'x'],
    });
  });

  it('falls back to the error message when git printed nothing', async () => {
    outcome.error = new Error('spawn git ENOENT');

    await expect(runGit('/repo', ['status'])).rejects.toThrow('git status failed: spawn git ENOENT');
  });
});

describe('GitClient', () => {
  it('reads the current branch', async () => {
    const git = new FakeGit();
    const client = new GitClient('/repo', new RecordingEmitter(), git.run);

    await expect(client.currentBranch()).resolves.toBe('main');
    expect(git.commands).toEqual([['rev-parse', '--abbrev-ref', 'HEAD']]);
  });

  it('announces branch operations after git succeeds', async () => {
    const git = new FakeGit();
    const emitter = new RecordingEmitter();
    const client = new GitClient('/repo', emitter, git.run);

    await client.createBranch('impl-aaaaaa');
    await client.createBranchFrom('impl-bbbbbb', 'impl-aaaaaa');
    await client.checkout('main');
    await client.deleteBranch('impl-aaaaaa');

    expect(git.commands).toEqual([
      ['checkout', '-b', 'impl-aaaaaa'],
      ['checkout', '-b', 'impl-bbbbbb', 'impl-aaaaaa'],
      ['checkout', 'main'],
      ['branch', '-D', 'impl-aaaaaa'],
    ]);
    expect(emitter.events).toEqual([
      { type: 'branch-created', payload: { name: 'impl-aaaaaa', base: '' } },
      { type: 'branch-created', payload: { name: 'impl-bbbbbb', base: 'impl-aaaaaa' } },
      { type: 'branch-checked-out', payload: { name: 'main' } },
      { type: 'branch-deleted', payload: { name: 'impl-aaaaaa' } },
    ]);
  });

  it('squashes everything since the merge base into one commit', async () => {
    const git = new FakeGit();
    const emitter = new RecordingEmitter();
    const client = new GitClient('/repo', emitter, git.run);

    await client.squashSince('main', 'improve: round 1');

    expect(git.commands).toEqual([
      ['merge-base', 'main', 'HEAD'],
      ['reset', '--soft', '0123456789abcdef'],
      ['add', '-A'],
      ['commit', '-m', 'improve: round 1'],
    ]);
    expect(emitter.events).toEqual([{ type: 'commits-squashed', payload: { branch: 'main' } }]);
  });

  it('emits nothing when a command fails', async () => {
    const git = new FakeGit((args) => {
      if (args[0] === 'commit') throw new VcsError(args, 'nothing to commit, working tree clean');
      return '';
    });
    const emitter = new RecordingEmitter();
    const client = new GitClient('/repo', emitter, git.run);

    await expect(client.squashSince('main', 'implement: x')).rejects.toThrow(
      'git commit -m implement: x failed: nothing to commit, working tree clean',
    );
    expect(emitter.events).toEqual([]);
  });
});
