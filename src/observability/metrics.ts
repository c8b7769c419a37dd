import type { Counter, Histogram } from '@opentelemetry/api';
import { getMeter, isTelemetryEnabled } from './telemetry';

let decisionCounter: Counter | null = null;
let githubDurationHistogram: Histogram | null = null;

/**
 * Initialize metrics instruments
 * Call this after telemetry is initialized
 */
export function initMetrics(): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const meter = getMeter();

  decisionCounter = meter.createCounter('deploy_gate.decision.count', {
    description: 'Count of gatekeeper decisions by outcome',
    unit: 'count',
  });

  githubDurationHistogram = meter.createHistogram('deploy_gate.github.duration', {
    description: 'GitHub API request duration in milliseconds',
    unit: 'ms',
  });
}

/**
 * Record a gatekeeper decision
 */
export function recordDecision(attributes: {
  eventKind: string;
  deployRequired: boolean;
  blocked: boolean;
}): void {
  decisionCounter?.add(1, {
    'event.kind': attributes.eventKind,
    deploy_required: String(attributes.deployRequired),
    blocked: String(attributes.blocked),
  });
}

/**
 * Record GitHub API request duration
 */
export function recordGitHubDuration(durationMs: number, attributes: { endpoint: string; status: number }): void {
  githubDurationHistogram?.record(durationMs, {
    endpoint: attributes.endpoint,
    status: attributes.status,
  });
}
