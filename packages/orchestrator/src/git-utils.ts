import { execFile } from 'node:child_process';
import type { IEventEmitter, IVcsClient } from '@agent-exec/core';
import { Events, VcsError, createLogger } from '@agent-exec/core';

const log = createLogger('GitUtils');

/** Runs `git <args>` in `repoDir`, resolving with trimmed stdout. */
export type GitRunner = (repoDir: string, args: string[]) => Promise<string>;

/** Promisified git command runner. Failures carry the combined output. */
export function runGit(repoDir: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile('git', args, { cwd: repoDir, maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        const output = [stdout, stderr].map((s) => s.trim()).filter(Boolean).join('\n') || error.message;
        log.error(`git ${args[0]} failed: ${output}`);
        reject(new VcsError(args, output, { cause: error }));
        return;
      }
      resolve(stdout.trim());
    });
  });
}

/**
 * The branch operations the tournament performs, each announced on the bus
 * once git has succeeded.
 */
export class GitClient implements IVcsClient {
  constructor(
    private readonly repoDir: string,
    private readonly emitter: IEventEmitter,
    private readonly git: GitRunner = runGit,
  ) {}

  async currentBranch(): Promise<string> {
    return this.git(this.repoDir, ['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async createBranch(name: string): Promise<void> {
    await this.git(this.repoDir, ['checkout', '-b', name]);
    await this.emitter.emit(Events.BRANCH_CREATED, { name, base: '' });
  }

  async createBranchFrom(name: string, base: string): Promise<void> {
    await this.git(this.repoDir, ['checkout', '-b', name, base]);
    await this.emitter.emit(Events.BRANCH_CREATED, { name, base });
  }

  async checkout(name: string): Promise<void> {
    await this.git(this.repoDir, ['checkout', name]);
    await this.emitter.emit(Events.BRANCH_CHECKED_OUT, { name });
  }

  async deleteBranch(name: string): Promise<void> {
    await this.git(this.repoDir, ['branch', '-D', name]);
    await this.emitter.emit(Events.BRANCH_DELETED, { name });
  }

  async squashSince(base: string, message: string): Promise<void> {
    const mergeBase = await this.git(this.repoDir, ['merge-base', base, 'HEAD']);
    // Soft reset keeps the working tree; `add -A` picks up files the assistant created.
    await this.git(this.repoDir, ['reset', '--soft', mergeBase]);
    await this.git(this.repoDir, ['add', '-A']);
    await this.git(this.repoDir, ['commit', '-m', message]);
    log.debug(`Squashed onto ${mergeBase.slice(0, 12)}: ${message}`);
    await this.emitter.emit(Events.COMMITS_SQUASHED, { branch: base });
  }
}
