import { GatekeeperContext, RepositoryHost } from '../types';
import { CommitClassifier } from './commit-classifier';
import { resolveCurrentCommit } from './current-commit';

/**
 * Deploy requirement rules
 *
 * Rules run in order; the first one returning an outcome decides and the
 * rest are never evaluated.
 */

/** Version tags such as v1.2.3 or v2.0rc1 */
export const RELEASE_TAG_PATTERN = /^v[0-9]+(\.[0-9]+)*([a-z]+[0-9]+)?/;

/** PR titles like "Aux: bump linters" or "123 aux: docs" */
export const AUX_TITLE_PATTERN = /^[0-9\s]*Aux:.*/i;

export interface RequirementOutcome {
  required: boolean;
  reason: string;
}

export interface RequirementVerdict extends RequirementOutcome {
  /** Name of the rule that decided */
  rule: string;
}

export interface RequirementRule {
  name: string;
  /** Returns an outcome to decide, or null to defer to the next rule */
  apply(context: GatekeeperContext, host: RepositoryHost): Promise<RequirementOutcome | null>;
}

const deploy = (reason: string): RequirementOutcome => ({ required: true, reason });
const skip = (reason: string): RequirementOutcome => ({ required: false, reason });

export const REQUIREMENT_RULES: readonly RequirementRule[] = [
  {
    name: 'release-tag',
    async apply({ event }) {
      if (event.kind === 'release' && !RELEASE_TAG_PATTERN.test(event.release.tagName)) {
        return skip(`Non-version tag "${event.release.tagName}", skipping the release.`);
      }
      return null;
    },
  },
  {
    name: 'non-pull-request',
    async apply({ event }) {
      return event.kind === 'pull_request' ? null : deploy('Not a PR, enable the release.');
    },
  },
  {
    name: 'draft',
    async apply({ event }) {
      return event.kind === 'pull_request' && event.pullRequest.draft
        ? skip('Skip release for a draft PR.')
        : null;
    },
  },
  {
    name: 'aux-title',
    async apply({ event }) {
      return event.kind === 'pull_request' && AUX_TITLE_PATTERN.test(event.pullRequest.title)
        ? skip('Skip release for a PR prefixed with `Aux:`.')
        : null;
    },
  },
  {
    name: 'human-commit',
    async apply(context, host) {
      const commit = await resolveCurrentCommit(context.event, host);
      const classifier = new CommitClassifier(host, context.botEmails);
      return (await classifier.isHuman(commit))
        ? deploy(`Commit ${commit.sha} was made by a human, enable the release.`)
        : skip('Skipping the release for a commit created by a bot.');
    },
  },
];

/**
 * Decide whether the run should deploy, naming the deciding rule
 */
export async function evaluateDeployRequirement(
  context: GatekeeperContext,
  host: RepositoryHost,
  rules: readonly RequirementRule[] = REQUIREMENT_RULES
): Promise<RequirementVerdict> {
  for (const rule of rules) {
    const outcome = await rule.apply(context, host);
    if (outcome) {
      console.log(`[DeployRequirement] ${outcome.reason}`);
      return { ...outcome, rule: rule.name };
    }
  }

  // Fail open: nothing said no
  return { required: true, reason: 'No rule decided, enable the release.', rule: 'default' };
}

export async function isDeployRequired(context: GatekeeperContext, host: RepositoryHost): Promise<boolean> {
  const verdict = await evaluateDeployRequirement(context, host);
  return verdict.required;
}
