import { loadActionsContext, parseRepository } from './actions/context';
import { ActionsOutput, RunnerOutput } from './actions/output';
import { loadGateConfig } from './config/load-config';
import { ConfigError, MalformedEventError } from './errors';
import { GitHubClient } from './github/client';
import { evaluateGate, ExitCode, publishDecision } from './orchestration/gatekeeper';
import { RepositoryHost } from './types';

export interface RunOptions {
  /** Repository host; a GitHubClient for GITHUB_REPOSITORY by default */
  host?: RepositoryHost;
  /** Output channel; writes to GITHUB_OUTPUT by default */
  output?: ActionsOutput;
}

/**
 * One gatekeeper run: load settings, decide, publish
 *
 * Misconfiguration (bad payload, missing env, invalid config file) is
 * reported on the error channel and yields ExitCode.Misconfigured. Remote
 * failures propagate to the caller.
 */
export async function runGatekeeper(env: NodeJS.ProcessEnv, options: RunOptions = {}): Promise<ExitCode> {
  const output = options.output ?? new RunnerOutput(env.GITHUB_OUTPUT);

  try {
    const config = loadGateConfig(env.DEPLOY_GATE_CONFIG, env.GITHUB_WORKSPACE || process.cwd());
    const context = loadActionsContext(env, config);
    const host = options.host ?? new GitHubClient({
      ...parseRepository(env.GITHUB_REPOSITORY),
      token: env.GITHUB_TOKEN,
      apiUrl: env.GITHUB_API_URL,
    });

    console.log(`[Gatekeeper] ${context.event.kind} on ${context.currentRef}, deploy branch ${context.deployBranch}`);

    const decision = await evaluateGate(context, host);
    console.log(`[Gatekeeper] Deploy note: ${decision.deployNote}`);
    return publishDecision(decision, output);
  } catch (error) {
    if (error instanceof MalformedEventError || error instanceof ConfigError) {
      output.reportError(`Pipeline misconfiguration: ${error.message}`);
      return ExitCode.Misconfigured;
    }
    throw error;
  }
}
