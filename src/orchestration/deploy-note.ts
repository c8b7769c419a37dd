import { Commit, GatekeeperContext, RepositoryHost } from '../types';
import { resolveCurrentCommit } from './current-commit';

/**
 * Deploy notes
 *
 * A deploy note is the single-line description of a change that the deploy
 * job embeds at the end of its automated commit on the deploy branch. Later
 * runs match deploy branch commits against it.
 */

// Every Unicode line boundary, not only \n
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

// Characters that never need quoting in a POSIX shell word
const SHELL_UNSAFE = /[^\w@%+=:,./-]/;

/**
 * First line of a PR title or commit message
 *
 * Text can arrive verbatim or already escaped, so the literal `\n` and `\r`
 * sequences are cut first, then real line breaks.
 */
export function extractTitle(text: string): string {
  return text.split('\\n', 1)[0].split('\\r', 1)[0].split(LINE_BREAK, 1)[0];
}

/**
 * Build the deploy note for the current run
 *
 * @param commit - Build the note from this commit instead of the event
 */
export async function buildDeployNote(
  context: GatekeeperContext,
  host: RepositoryHost,
  commit?: Commit
): Promise<string> {
  const { event } = context;

  if (event.kind === 'pull_request' && !commit) {
    return `PR: ${extractTitle(event.pullRequest.title)} ${event.pullRequest.htmlUrl}`;
  }

  const source = commit ?? (await resolveCurrentCommit(event, host));
  return `Commit: ${extractTitle(source.message)} ${source.htmlUrl}`;
}

/**
 * Quote a note so it can be pasted into a shell command as one argument
 */
export function quoteNote(note: string): string {
  if (note === '') {
    return "''";
  }
  if (!SHELL_UNSAFE.test(note)) {
    return note;
  }
  return `'${note.replace(/'/g, `'"'"'`)}'`;
}
