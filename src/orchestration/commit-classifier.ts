import { Commit, RepositoryHost } from '../types';

/**
 * Message of the commits the image-bump automation pushes
 */
export const AUTO_BUMP_PATTERN = /^Automatically set version .* of image .* in kustomization\.yaml.*/;

export function isBotEmail(email: string, botEmails: readonly string[]): boolean {
  return botEmails.includes(email);
}

/**
 * A commit is automated only when a bot committed it AND the message is an
 * image version bump. Anything else counts as human.
 */
export function isAutomatedCommit(commit: Commit, botEmails: readonly string[]): boolean {
  return isBotEmail(commit.committer.email, botEmails) && AUTO_BUMP_PATTERN.test(commit.message);
}

/**
 * Human vs. automated classification of commits
 *
 * Merge commits are judged by their parents, since the merge itself is
 * always created by the host on behalf of whoever merged.
 */
export class CommitClassifier {
  constructor(
    private readonly host: RepositoryHost,
    private readonly botEmails: readonly string[]
  ) {}

  /**
   * @returns false only when every examined commit is automated
   */
  async isHuman(commit: Commit): Promise<boolean> {
    const commits = commit.parents.length > 1 ? await this.fetchParents(commit) : [commit];

    return !commits.every((candidate) => isAutomatedCommit(candidate, this.botEmails));
  }

  private async fetchParents(commit: Commit): Promise<Commit[]> {
    const parents: Commit[] = [];
    for (const sha of commit.parents) {
      parents.push(await this.host.fetchCommit(sha));
    }
    return parents;
  }
}
