import {
  BranchComparisonStatus,
  Commit,
  GatekeeperContext,
  PullRequestInfo,
  RepositoryHost,
  TriggerEvent,
} from '../../types';

export const BOT_EMAIL = 'github-actions[bot]@users.noreply.github.com';
export const HUMAN_EMAIL = 'dev@example.com';

// Helper to create a commit with sensible defaults
export function makeCommit(overrides?: Partial<Commit>): Commit {
  return {
    sha: 'abc123',
    message: 'Add retry logic',
    author: { name: 'Dev', email: HUMAN_EMAIL },
    committer: { name: 'Dev', email: HUMAN_EMAIL },
    parents: ['parent0'],
    htmlUrl: 'https://host/commit/abc123',
    ...overrides,
  };
}

export function makeBumpCommit(overrides?: Partial<Commit>): Commit {
  return makeCommit({
    sha: 'bump1',
    message: 'Automatically set version 1.4.0 of image api in kustomization.yaml',
    committer: { name: 'github-actions[bot]', email: BOT_EMAIL },
    htmlUrl: 'https://host/commit/bump1',
    ...overrides,
  });
}

export function makePullRequestEvent(overrides?: Partial<PullRequestInfo>): TriggerEvent {
  return {
    kind: 'pull_request',
    ref: 'refs/pull/42/merge',
    sha: 'merge42',
    pullRequest: {
      number: 42,
      title: 'Fix bug #42',
      draft: false,
      headRef: 'fix-bug',
      htmlUrl: 'https://host/pr/42',
      ...overrides,
    },
  };
}

export function makeContext(event: TriggerEvent, overrides?: Partial<GatekeeperContext>): GatekeeperContext {
  return {
    event,
    currentRef: 'fix-bug',
    mainBranch: 'main',
    deployBranch: 'deploy/dev',
    botEmails: [BOT_EMAIL, 'noreply@github.com'],
    repositoryUrl: 'https://github.com/acme/shop',
    resetWorkflow: 'reset-dev-deploy-branch.yml',
    ...overrides,
  };
}

/**
 * In-memory repository host recording every call
 */
export class FakeRepositoryHost implements RepositoryHost {
  readonly calls: string[] = [];
  private readonly commits = new Map<string, Commit>();
  private readonly branches = new Map<string, string>();
  private readonly comparisons = new Map<string, BranchComparisonStatus>();

  addCommit(commit: Commit): this {
    this.commits.set(commit.sha, commit);
    return this;
  }

  setBranch(name: string, commit: Commit): this {
    this.addCommit(commit);
    this.branches.set(name, commit.sha);
    return this;
  }

  setComparison(base: string, head: string, status: BranchComparisonStatus): this {
    this.comparisons.set(`${base}...${head}`, status);
    return this;
  }

  async fetchCommit(sha: string): Promise<Commit> {
    this.calls.push(`commit:${sha}`);
    const commit = this.commits.get(sha);
    if (!commit) {
      throw new Error(`Unknown commit ${sha}`);
    }
    return commit;
  }

  async fetchBranchHead(branch: string): Promise<Commit> {
    this.calls.push(`branch:${branch}`);
    const sha = this.branches.get(branch);
    if (!sha) {
      throw new Error(`Unknown branch ${branch}`);
    }
    return this.fetchCommit(sha);
  }

  async compareBranches(base: string, head: string): Promise<BranchComparisonStatus> {
    this.calls.push(`compare:${base}...${head}`);
    return this.comparisons.get(`${base}...${head}`) ?? 'diverged';
  }
}
