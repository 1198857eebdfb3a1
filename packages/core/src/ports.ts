// Core ports (interfaces) for external infrastructure
// adhering to Hexagonal Architecture (Ports & Adapters)

/**
 * VCS Port
 * The clone/fetch/checkout capability the mirror needs from a version-control tool.
 * All paths are absolute.
 */
export interface VcsClient {
  /**
   * Full clone of `url` into `gitDir` (a bare repository, no working tree)
   */
  clone(url: string, gitDir: string): Promise<void>;

  /**
   * Fetch upstream branches into `gitDir`, pruning deleted ones
   */
  fetch(gitDir: string): Promise<void>;

  /**
   * Resolve `ref` (branch name or HEAD) to a commit identifier
   */
  resolveRevision(gitDir: string, ref: string): Promise<string>;

  /**
   * Write the complete tree of `revision` into the existing, empty `targetDir`
   */
  checkout(gitDir: string, revision: string, targetDir: string): Promise<void>;
}
