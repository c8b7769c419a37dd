import * as fs from 'fs';
import { MalformedEventError } from '../errors';
import { GateConfig } from '../config/load-config';
import { getBoolean, getNumber, getRecord, getString, isRecord, JsonRecord, toCommit } from '../github/payload';
import { GatekeeperContext, TriggerEvent } from '../types';

/**
 * GitHub Actions context
 *
 * Turns the runner environment and the event payload file into a single
 * immutable GatekeeperContext. Nothing downstream reads process.env.
 */

export interface RepositoryCoordinates {
  owner: string;
  repo: string;
}

/**
 * Parse the event payload into a TriggerEvent
 *
 * @param eventName - GITHUB_EVENT_NAME
 * @param payload - Parsed contents of GITHUB_EVENT_PATH
 * @param run - SHA and ref recorded for the run
 */
export function parseTriggerEvent(
  eventName: string,
  payload: JsonRecord,
  run: { sha: string; ref: string }
): TriggerEvent {
  const { sha, ref } = run;

  switch (eventName) {
    case 'pull_request': {
      const pullRequest = getRecord(payload, 'pull_request');
      if (!pullRequest) {
        throw new MalformedEventError('pull_request');
      }

      const title = getString(pullRequest, 'title');
      if (title === undefined) {
        throw new MalformedEventError('pull_request.title');
      }

      const links = getRecord(pullRequest, '_links');
      const htmlLink = links ? getRecord(links, 'html') : undefined;
      const htmlUrl = (htmlLink && getString(htmlLink, 'href')) ?? getString(pullRequest, 'html_url');
      if (!htmlUrl) {
        throw new MalformedEventError('pull_request._links.html.href');
      }

      const head = getRecord(pullRequest, 'head');
      const headRef = head ? getString(head, 'ref') : undefined;
      if (!headRef) {
        throw new MalformedEventError('pull_request.head.ref');
      }

      return {
        kind: 'pull_request',
        sha,
        ref,
        pullRequest: {
          number: getNumber(pullRequest, 'number') ?? 0,
          title,
          draft: getBoolean(pullRequest, 'draft') ?? false,
          headRef,
          htmlUrl,
        },
      };
    }

    case 'push': {
      const rawHead = getRecord(payload, 'head_commit');
      const headCommit = rawHead ? toCommit(rawHead) : null;
      if (rawHead && !headCommit) {
        throw new MalformedEventError('head_commit');
      }
      return { kind: 'push', sha, ref, headCommit };
    }

    case 'release': {
      const release = getRecord(payload, 'release');
      const tagName = release ? getString(release, 'tag_name') : undefined;
      if (tagName === undefined) {
        throw new MalformedEventError('release.tag_name');
      }
      return { kind: 'release', sha, ref, release: { tagName } };
    }

    case 'workflow_dispatch':
      return { kind: 'workflow_dispatch', sha, ref };

    default:
      return { kind: 'other', name: eventName, sha, ref };
  }
}

/**
 * Short name of the ref being built: the PR head branch when there is one,
 * otherwise the last path segment of GITHUB_REF.
 */
export function resolveCurrentRef(headRef: string | undefined, ref: string): string {
  if (headRef) {
    return headRef;
  }
  const segments = ref.split('/');
  return segments[segments.length - 1];
}

/**
 * Split GITHUB_REPOSITORY ("owner/repo")
 */
export function parseRepository(value: string | undefined): RepositoryCoordinates {
  const [owner, repo, ...rest] = (value || '').split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new MalformedEventError('GITHUB_REPOSITORY', `GITHUB_REPOSITORY must look like "owner/repo", got "${value ?? ''}"`);
  }
  return { owner, repo };
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new MalformedEventError(name, `${name} environment variable not set`);
  }
  return value;
}

/**
 * Read and parse the JSON file at GITHUB_EVENT_PATH
 */
export function readEventPayload(eventPath: string): JsonRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(eventPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedEventError('GITHUB_EVENT_PATH', `Cannot read event payload ${eventPath}: ${message}`);
  }
  if (!isRecord(raw)) {
    throw new MalformedEventError('GITHUB_EVENT_PATH', `Event payload ${eventPath} is not a JSON object`);
  }
  return raw;
}

/**
 * Build the gatekeeper context from the runner environment
 *
 * @param env - Usually process.env
 * @param config - Loaded deploy-gate.yaml settings
 */
export function loadActionsContext(env: NodeJS.ProcessEnv, config: GateConfig): GatekeeperContext {
  const eventName = requireEnv(env, 'GITHUB_EVENT_NAME');
  const payload = readEventPayload(requireEnv(env, 'GITHUB_EVENT_PATH'));
  const sha = requireEnv(env, 'GITHUB_SHA');
  const ref = env.GITHUB_REF || '';

  const event = parseTriggerEvent(eventName, payload, { sha, ref });

  const repository = getRecord(payload, 'repository');
  const mainBranch = repository ? getString(repository, 'default_branch') : undefined;
  if (!mainBranch) {
    throw new MalformedEventError('repository.default_branch');
  }

  const serverUrl = env.GITHUB_SERVER_URL || 'https://github.com';
  const repositoryUrl =
    (repository && getString(repository, 'html_url')) ??
    (env.GITHUB_REPOSITORY ? `${serverUrl}/${env.GITHUB_REPOSITORY}` : undefined);
  if (!repositoryUrl) {
    throw new MalformedEventError('repository.html_url');
  }

  return Object.freeze({
    event,
    currentRef: resolveCurrentRef(env.GITHUB_HEAD_REF, ref),
    mainBranch,
    deployBranch: config.deployBranch,
    botEmails: Object.freeze([...config.botEmails]),
    repositoryUrl,
    resetWorkflow: config.resetWorkflow,
  });
}
