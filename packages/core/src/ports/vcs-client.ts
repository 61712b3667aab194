/** The branch operations the tournament needs. Every mutation emits one event. */
export interface IVcsClient {
  currentBranch(): Promise<string>;
  /** Create `name` at HEAD and check it out */
  createBranch(name: string): Promise<void>;
  /** Create `name` at `base` and check it out */
  createBranchFrom(name: string, base: string): Promise<void>;
  checkout(name: string): Promise<void>;
  /** Force-delete `name` */
  deleteBranch(name: string): Promise<void>;
  /**
   * Collapse everything since the merge-base with `base` into one commit,
   * keeping the working tree (new files included).
   */
  squashSince(base: string, message: string): Promise<void>;
}
