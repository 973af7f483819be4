import { simpleGit } from "simple-git";

/** The part of simple-git used here; a `SimpleGit` instance satisfies it. */
export type RemoteLister = {
  listRemote(args: string[]): PromiseLike<string>;
};

/**
 * Thin wrapper over simple-git.
 * Only remote queries are needed: nothing is cloned.
 */
export class GitOperations {
  private git: RemoteLister;

  constructor(git?: RemoteLister) {
    this.git = git ?? simpleGit();
  }

  /** Tip of `branch` on the remote at `repositoryUrl`, or undefined when the branch does not exist. */
  async latestBranchRevision(repositoryUrl: string, branch: string): Promise<string | undefined> {
    const out = await this.git.listRemote(["--heads", repositoryUrl, `refs/heads/${branch}`]);
    // "<sha>\trefs/heads/<branch>"
    const [first] = out
      .trim()
      .split("\n")
      .filter((l) => l.length > 0);
    return first?.split("\t")[0];
  }
}
