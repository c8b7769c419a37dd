import { Commit, GitIdentity } from '../types';

/**
 * Narrowing helpers for JSON coming from the GitHub API or the runner's
 * event payload file.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRecord(obj: JsonRecord, key: string): JsonRecord | undefined {
  const value = obj[key];
  return isRecord(value) ? value : undefined;
}

export function getString(obj: JsonRecord, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(obj: JsonRecord, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' ? value : undefined;
}

export function getBoolean(obj: JsonRecord, key: string): boolean | undefined {
  const value = obj[key];
  return typeof value === 'boolean' ? value : undefined;
}

function toIdentity(raw: JsonRecord | undefined): GitIdentity {
  return {
    name: (raw && getString(raw, 'name')) || '',
    email: (raw && getString(raw, 'email')) || '',
  };
}

/**
 * Build a Commit from either shape GitHub uses:
 * - the Git database API (`sha`, `html_url`, `parents[].sha`)
 * - a push event's `head_commit` (`id`, `url`, no parents)
 *
 * Returns null when the object has no SHA, no message or no link.
 */
export function toCommit(raw: JsonRecord): Commit | null {
  const sha = getString(raw, 'sha') ?? getString(raw, 'id');
  const message = getString(raw, 'message');
  const htmlUrl = getString(raw, 'html_url') ?? getString(raw, 'url');

  if (!sha || message === undefined || !htmlUrl) {
    return null;
  }

  const rawParents = raw.parents;
  const parents: string[] = [];
  if (Array.isArray(rawParents)) {
    for (const parent of rawParents) {
      const parentSha = isRecord(parent) ? getString(parent, 'sha') : undefined;
      if (parentSha) {
        parents.push(parentSha);
      }
    }
  }

  return {
    sha,
    message,
    author: toIdentity(getRecord(raw, 'author')),
    committer: toIdentity(getRecord(raw, 'committer')),
    parents,
    htmlUrl,
  };
}
