import { Commit, RepositoryHost, TriggerEvent } from '../types';

/**
 * The commit a run is about: the push payload's head commit when the runner
 * sent one, otherwise the commit recorded for the run's SHA.
 */
export async function resolveCurrentCommit(event: TriggerEvent, host: RepositoryHost): Promise<Commit> {
  if (event.kind === 'push' && event.headCommit) {
    return event.headCommit;
  }
  return host.fetchCommit(event.sha);
}
