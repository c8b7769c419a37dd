export interface GitIdentity {
  name: string;
  email: string;
}

/**
 * A commit as read from the repository host. Never cached across runs.
 */
export interface Commit {
  sha: string;
  message: string;
  author: GitIdentity;
  committer: GitIdentity;
  /** Parent SHAs; empty for a root commit or when the source omits them */
  parents: string[];
  /** Web link, falling back to the API URL when the host gives none */
  htmlUrl: string;
}

export type BranchComparisonStatus = 'identical' | 'ahead' | 'behind' | 'diverged';
