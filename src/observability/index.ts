/**
 * Observability Module
 *
 * OpenTelemetry-based events and metrics for the deploy gatekeeper.
 */

export { initTelemetry } from './telemetry';

export {
  emitDecision,
  emitBlocked,
  emitRemoteError,
} from './events';

export {
  initMetrics,
  recordDecision,
  recordGitHubDuration,
} from './metrics';
