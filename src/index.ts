#!/usr/bin/env node
import 'dotenv/config';
import { initMetrics, initTelemetry } from './observability';
import { runGatekeeper } from './run';

/**
 * Entry point of the deploy gate step
 *
 * Exit status: 0 proceed, 1 blocked or remote failure, 2 misconfigured.
 */
async function main() {
  initTelemetry();
  initMetrics();

  process.exitCode = await runGatekeeper(process.env);
}

main().catch((error) => {
  console.error('[Gatekeeper] Fatal error:', error);
  process.exit(1);
});
