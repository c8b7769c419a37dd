import { Commit } from './commit';

export type TriggerEventKind =
  | 'pull_request'
  | 'push'
  | 'release'
  | 'workflow_dispatch'
  | 'other';

interface BaseTriggerEvent {
  /** Full ref the workflow fired on (e.g. refs/heads/main) */
  ref: string;
  /** SHA recorded for the run; the merge commit for pull requests */
  sha: string;
}

export interface PullRequestInfo {
  number: number;
  title: string;
  draft: boolean;
  headRef: string;
  htmlUrl: string;
}

export interface PullRequestEvent extends BaseTriggerEvent {
  kind: 'pull_request';
  pullRequest: PullRequestInfo;
}

export interface PushEvent extends BaseTriggerEvent {
  kind: 'push';
  /** Absent when the push deleted the branch */
  headCommit: Commit | null;
}

export interface ReleaseEvent extends BaseTriggerEvent {
  kind: 'release';
  release: {
    tagName: string;
  };
}

export interface WorkflowDispatchEvent extends BaseTriggerEvent {
  kind: 'workflow_dispatch';
}

export interface OtherEvent extends BaseTriggerEvent {
  kind: 'other';
  /** Raw event name reported by the runner */
  name: string;
}

export type TriggerEvent =
  | PullRequestEvent
  | PushEvent
  | ReleaseEvent
  | WorkflowDispatchEvent
  | OtherEvent;
