import { Commit, GatekeeperContext, RepositoryHost } from '../types';
import { isBotEmail } from './commit-classifier';
import { buildDeployNote } from './deploy-note';

/**
 * Deploy safety
 *
 * A deployment is safe when it cannot overwrite somebody else's change on
 * the deploy branch: either the deploy branch equals main or the PR branch,
 * or its last automated commit was made for this very change.
 */

export interface SafetyVerdict {
  safe: boolean;
  reason: string;
}

/**
 * Reference point the deploy branch may have been built from
 */
interface NoteCandidate {
  name: string;
  /** Commit to build the note from; omitted for the run's own change */
  commit?: Commit;
}

/**
 * First of the given branches that compares identical to the deploy branch
 */
export async function findDirectlyDeployedBranch(
  host: RepositoryHost,
  branches: readonly string[],
  deployBranch: string
): Promise<string | null> {
  for (const branch of branches) {
    if ((await host.compareBranches(branch, deployBranch)) === 'identical') {
      return branch;
    }
  }
  return null;
}

/**
 * Check whether deploying the current run would conflict with the deploy branch
 */
export async function checkDeploySafety(context: GatekeeperContext, host: RepositoryHost): Promise<SafetyVerdict> {
  const { event, deployBranch, mainBranch, botEmails } = context;

  if (event.kind !== 'pull_request') {
    return { safe: true, reason: 'Not a PR, assume it is safe to deploy.' };
  }

  const identical = await findDirectlyDeployedBranch(
    host,
    [mainBranch, event.pullRequest.headRef],
    deployBranch
  );
  if (identical) {
    return { safe: true, reason: `${deployBranch} is identical to ${identical}, allow to override.` };
  }

  const lastDeployCommit = await host.fetchBranchHead(deployBranch);
  const lastMainCommit = await host.fetchBranchHead(mainBranch);

  const candidates: NoteCandidate[] = [
    { name: 'HEAD' },
    { name: mainBranch, commit: lastMainCommit },
  ];

  for (const candidate of candidates) {
    if (!isBotEmail(lastDeployCommit.committer.email, botEmails)) {
      continue;
    }

    const note = await buildDeployNote(context, host, candidate.commit);
    if (lastDeployCommit.message.endsWith(note)) {
      return { safe: true, reason: `The deploy seems to be based on ${candidate.name}. Allow to override.` };
    }
  }

  return {
    safe: false,
    reason: `${deployBranch} head ${lastDeployCommit.sha} matches neither HEAD nor ${mainBranch}.`,
  };
}

export async function isSafeToDeploy(context: GatekeeperContext, host: RepositoryHost): Promise<boolean> {
  const verdict = await checkDeploySafety(context, host);
  console.log(`[DeploySafety] ${verdict.reason}`);
  return verdict.safe;
}
