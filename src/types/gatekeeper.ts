import { BranchComparisonStatus, Commit } from './commit';
import { TriggerEvent } from './trigger-event';

/**
 * Everything a single gatekeeper run needs to know about its surroundings.
 * Built once at startup and passed explicitly to each component.
 */
export interface GatekeeperContext {
  readonly event: TriggerEvent;
  /** Short name of the branch or tag being built */
  readonly currentRef: string;
  readonly mainBranch: string;
  readonly deployBranch: string;
  readonly botEmails: readonly string[];
  /** Repository web URL, used to link the reset workflow */
  readonly repositoryUrl: string;
  /** Workflow file that resets the deploy branch */
  readonly resetWorkflow: string;
}

/**
 * Read-only view of the remote repository host
 */
export interface RepositoryHost {
  fetchCommit(sha: string): Promise<Commit>;
  fetchBranchHead(branch: string): Promise<Commit>;
  compareBranches(base: string, head: string): Promise<BranchComparisonStatus>;
}

export interface GatekeeperDecision {
  deployNote: string;
  quotedNote: string;
  deployRequired: boolean;
  blocked: boolean;
  /** Explanation shown to the user when blocked */
  message?: string;
}
