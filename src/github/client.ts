import { RemoteFetchError } from '../errors';
import { emitRemoteError, recordGitHubDuration } from '../observability';
import { BranchComparisonStatus, Commit, RepositoryHost } from '../types';
import { getRecord, getString, isRecord, toCommit } from './payload';

/**
 * GitHub REST client for the gatekeeper
 *
 * Handles:
 * - Authenticating with the token the runner provides
 * - Reading commits and branch heads from the Git database API
 * - Comparing two branches
 */

export interface GitHubClientConfig {
  owner: string;
  repo: string;
  /** Runner-provided token; requests go out unauthenticated without it */
  token?: string;
  /** Base API URL, for GitHub Enterprise Server (default: https://api.github.com) */
  apiUrl?: string;
}

const DEFAULT_API_URL = 'https://api.github.com';

const COMPARISON_STATUSES: readonly BranchComparisonStatus[] = ['identical', 'ahead', 'behind', 'diverged'];

function isComparisonStatus(value: string): value is BranchComparisonStatus {
  return COMPARISON_STATUSES.some((status) => status === value);
}

/**
 * Encode a ref name for a URL path, keeping the slashes of names like deploy/dev
 */
export function encodeRefPath(ref: string): string {
  return ref.split('/').map(encodeURIComponent).join('/');
}

/**
 * Make a request to the GitHub API
 *
 * @param config - Repository and credentials
 * @param endpoint - API endpoint relative to the repository (e.g., '/git/commits/abc')
 * @returns Response from GitHub API
 */
export async function githubRequest(config: GitHubClientConfig, endpoint: string): Promise<Response> {
  const apiUrl = (config.apiUrl || DEFAULT_API_URL).replace(/\/+$/, '');
  const url = `${apiUrl}/repos/${config.owner}/${config.repo}${endpoint}`;

  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
  };
  if (config.token) {
    headers.Authorization = `Bearer ${config.token}`;
  }

  return fetch(url, { headers });
}

/**
 * Read-only repository host backed by the GitHub REST API
 */
export class GitHubClient implements RepositoryHost {
  constructor(private readonly config: GitHubClientConfig) {}

  /**
   * Get a commit from the Git database API
   */
  async fetchCommit(sha: string): Promise<Commit> {
    const endpoint = `/git/commits/${encodeURIComponent(sha)}`;
    const body = await this.getJson(endpoint, `Failed to get commit ${sha}`);
    const commit = isRecord(body) ? toCommit(body) : null;
    if (!commit) {
      throw new RemoteFetchError(`Unexpected commit payload for ${sha}`, undefined, { endpoint });
    }
    return commit;
  }

  /**
   * Get the commit a branch currently points to
   */
  async fetchBranchHead(branch: string): Promise<Commit> {
    const endpoint = `/git/ref/heads/${encodeRefPath(branch)}`;
    const body = await this.getJson(endpoint, `Failed to get branch ${branch}`);
    const target = isRecord(body) ? getRecord(body, 'object') : undefined;
    const sha = target ? getString(target, 'sha') : undefined;
    if (!sha) {
      throw new RemoteFetchError(`Unexpected ref payload for ${branch}`, undefined, { endpoint });
    }
    return this.fetchCommit(sha);
  }

  /**
   * Compare two branches; 'identical' means both point at the same tree history
   */
  async compareBranches(base: string, head: string): Promise<BranchComparisonStatus> {
    const endpoint = `/compare/${encodeRefPath(base)}...${encodeRefPath(head)}`;
    const body = await this.getJson(endpoint, `Failed to compare ${base}...${head}`);
    const status = isRecord(body) ? getString(body, 'status') : undefined;
    if (!status || !isComparisonStatus(status)) {
      throw new RemoteFetchError(`Unexpected comparison status for ${base}...${head}: ${status}`, undefined, {
        endpoint,
      });
    }
    return status;
  }

  private async getJson(endpoint: string, failure: string): Promise<unknown> {
    const startedAt = Date.now();
    let response: Response;
    try {
      response = await githubRequest(this.config, endpoint);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      emitRemoteError({ endpoint, error: message });
      throw new RemoteFetchError(`${failure}: ${message}`, undefined, { endpoint });
    }

    recordGitHubDuration(Date.now() - startedAt, { endpoint, status: response.status });

    if (!response.ok) {
      const detail = await response.text();
      emitRemoteError({ endpoint, error: detail, statusCode: response.status });
      throw new RemoteFetchError(`${failure}: ${response.status} - ${detail}`, response.status, { endpoint });
    }

    try {
      return await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      emitRemoteError({ endpoint, error: message, statusCode: response.status });
      throw new RemoteFetchError(`${failure}: invalid JSON response - ${message}`, response.status, { endpoint });
    }
  }
}
