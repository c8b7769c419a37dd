import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { metrics } from '@opentelemetry/api';

/**
 * OpenTelemetry wiring for the deploy gatekeeper
 *
 * Events go through the global OTEL logs provider and metrics through the
 * global meter provider. When no SDK is registered, both APIs are no-ops.
 */

const INSTRUMENTATION_NAME = 'deploy-gatekeeper';

export type EventSeverity = 'info' | 'warn' | 'error';

export type EventAttributes = Record<string, string | number | boolean>;

const SEVERITY: Record<EventSeverity, { number: SeverityNumber; text: string }> = {
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
};

// Runner variables attached to every event, keyed by attribute name
const RUN_ATTRIBUTES: Record<string, string> = {
  'github.repository': 'GITHUB_REPOSITORY',
  'github.run_id': 'GITHUB_RUN_ID',
  'github.workflow': 'GITHUB_WORKFLOW',
};

export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEPLOY_GATE_ENABLE_TELEMETRY === '1';
}

/**
 * Report the telemetry state at startup
 *
 * Exporters are registered outside this process (for example with
 * --require of an OTEL SDK bootstrap).
 */
export function initTelemetry(env: NodeJS.ProcessEnv = process.env): void {
  if (!isTelemetryEnabled(env)) {
    return;
  }

  console.log('[Telemetry] Enabled');
  if (env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    console.log(`[Telemetry] OTLP endpoint: ${env.OTEL_EXPORTER_OTLP_ENDPOINT}`);
  } else {
    console.log('[Telemetry] No OTEL_EXPORTER_OTLP_ENDPOINT set; events are dropped unless an SDK is registered');
  }
}

export function getMeter(name: string = INSTRUMENTATION_NAME) {
  return metrics.getMeter(name);
}

/**
 * Attributes identifying the workflow run, from the runner environment
 */
export function runAttributes(env: NodeJS.ProcessEnv = process.env): EventAttributes {
  const attributes: EventAttributes = {};
  for (const [attribute, variable] of Object.entries(RUN_ATTRIBUTES)) {
    const value = env[variable];
    if (value) {
      attributes[attribute] = value;
    }
  }
  return attributes;
}

/**
 * Emit a gatekeeper event through OTEL logs
 *
 * Falls back to a structured console line if the logs provider throws.
 */
export function emitEvent(
  eventName: string,
  attributes: EventAttributes,
  severity: EventSeverity = 'info',
  env: NodeJS.ProcessEnv = process.env
): void {
  if (!isTelemetryEnabled(env)) {
    return;
  }

  const timestamp = new Date().toISOString();
  const recordAttributes: EventAttributes = {
    'event.name': eventName,
    'event.timestamp': timestamp,
    ...runAttributes(env),
    ...attributes,
  };

  try {
    logs.getLogger(INSTRUMENTATION_NAME).emit({
      severityNumber: SEVERITY[severity].number,
      severityText: SEVERITY[severity].text,
      body: eventName,
      attributes: recordAttributes,
    });
  } catch (error) {
    console.log(`[Event] ${eventName}`, JSON.stringify(recordAttributes), error);
  }
}
