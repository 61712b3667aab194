export { GitClient, runGit } from './git-utils.js';
export type { GitRunner } from './git-utils.js';
export { randomBranchName, truncate } from './branch-names.js';
export { buildComparePrompt, parseLoserBranch } from './judge.js';
export { InterruptWatcher } from './interrupt-watcher.js';
export type { InterruptSignal, SignalSource, SleepOutcome } from './interrupt-watcher.js';
export { LoopRunner } from './loop-runner.js';
export type { LoopOptions, LoopDependencies } from './loop-runner.js';
export { EvolveEngine } from './evolve-engine.js';
export type { EvolveDependencies, TournamentPhase } from './evolve-engine.js';
