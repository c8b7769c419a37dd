import { ActionsOutput } from '../actions/output';
import { emitBlocked, emitDecision, recordDecision } from '../observability';
import { GatekeeperContext, GatekeeperDecision, RepositoryHost } from '../types';
import { buildDeployNote, quoteNote } from './deploy-note';
import { isDeployRequired } from './deploy-requirement';
import { isSafeToDeploy } from './deploy-safety';

export const ExitCode = {
  Proceed: 0,
  Blocked: 1,
  Misconfigured: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Explanation shown when a required deployment conflicts with the deploy branch
 */
export function formatConflictMessage(context: GatekeeperContext): string {
  const { deployBranch, currentRef, repositoryUrl, resetWorkflow } = context;
  return [
    `The branch "${deployBranch}" is not a direct descendant of "${currentRef}".`,
    'Make sure the conflicting PRs are merged and re-run this job.',
    `If it did not help, try resetting the ${deployBranch} branch with`,
    `"Reset ${deployBranch} branch" action:`,
    `${repositoryUrl.replace(/\/+$/, '')}/actions/workflows/${resetWorkflow}`,
  ].join('\n');
}

/**
 * Decide whether the current run should deploy and whether it may
 *
 * Reads from the repository host only; never touches a branch.
 */
export async function evaluateGate(context: GatekeeperContext, host: RepositoryHost): Promise<GatekeeperDecision> {
  const deployNote = await buildDeployNote(context, host);
  const quotedNote = quoteNote(deployNote);

  const deployRequired = await isDeployRequired(context, host);
  const blocked = deployRequired && !(await isSafeToDeploy(context, host));

  emitDecision({
    eventKind: context.event.kind,
    ref: context.currentRef,
    deployRequired,
    blocked,
  });
  recordDecision({ eventKind: context.event.kind, deployRequired, blocked });

  if (!blocked) {
    return { deployNote, quotedNote, deployRequired, blocked };
  }

  emitBlocked({ ref: context.currentRef, deployBranch: context.deployBranch });
  return {
    deployNote,
    quotedNote,
    deployRequired,
    blocked,
    message: formatConflictMessage(context),
  };
}

/**
 * Write the decision to the step outputs; report the conflict when blocked
 */
export function publishDecision(decision: GatekeeperDecision, output: ActionsOutput): ExitCode {
  output.setOutput('note_raw', decision.deployNote);
  output.setOutput('note_clean', decision.quotedNote);
  output.setOutput('confirm', String(decision.deployRequired));

  if (decision.blocked) {
    output.reportError(decision.message ?? `Deployment of ${decision.deployNote} is blocked.`);
    return ExitCode.Blocked;
  }

  return ExitCode.Proceed;
}
