import { emitEvent } from './telemetry';

/**
 * Deploy gatekeeper events, emitted via OpenTelemetry logs
 */

/**
 * Emit once per run with the final decision
 */
export function emitDecision(params: {
  eventKind: string;
  ref: string;
  deployRequired: boolean;
  blocked: boolean;
}): void {
  emitEvent('deploy_gate.decision', {
    'event.kind': params.eventKind,
    'git.ref': params.ref,
    deploy_required: params.deployRequired,
    blocked: params.blocked,
  });
}

/**
 * Emit when a required deployment conflicts with the deploy branch
 */
export function emitBlocked(params: {
  ref: string;
  deployBranch: string;
}): void {
  emitEvent('deploy_gate.blocked', {
    'git.ref': params.ref,
    deploy_branch: params.deployBranch,
  }, 'warn');
}

/**
 * Emit when a repository host call fails
 */
export function emitRemoteError(params: {
  endpoint: string;
  error: string;
  statusCode?: number;
}): void {
  emitEvent('deploy_gate.remote_error', {
    endpoint: params.endpoint,
    error: params.error,
    status_code: params.statusCode || 0,
  }, 'error');
}
