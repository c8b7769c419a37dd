import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError } from '../errors';
import { isRecord } from '../github/payload';
import { validateGateConfig } from './validate-config';

/**
 * Settings that vary between repositories using the gatekeeper
 */
export interface GateConfig {
  deployBranch: string;
  botEmails: string[];
  resetWorkflow: string;
}

export const DEFAULT_GATE_CONFIG: Readonly<GateConfig> = Object.freeze({
  deployBranch: 'deploy/dev',
  botEmails: ['github-actions[bot]@users.noreply.github.com', 'noreply@github.com'],
  resetWorkflow: 'reset-dev-deploy-branch.yml',
});

export const DEFAULT_CONFIG_PATH = path.join('.github', 'deploy-gate.yaml');

/**
 * Load gatekeeper configuration from a YAML file
 *
 * A missing file yields the defaults. An explicitly requested file that does
 * not exist, or any validation error, raises ConfigError.
 *
 * @param configPath - Path from DEPLOY_GATE_CONFIG, if set
 * @param workspace - Directory the default path is resolved against
 */
export function loadGateConfig(
  configPath: string | undefined,
  workspace: string = process.cwd()
): GateConfig {
  const resolved = path.resolve(workspace, configPath || DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return { ...DEFAULT_GATE_CONFIG, botEmails: [...DEFAULT_GATE_CONFIG.botEmails] };
  }

  const content = fs.readFileSync(resolved, 'utf8');
  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${resolved}: ${message}`);
  }

  console.log(`[Config] Loaded ${resolved}`);
  return parseGateConfig(raw ?? {}, resolved);
}

/**
 * Validate raw YAML and merge it over the defaults
 */
export function parseGateConfig(raw: unknown, source = 'config'): GateConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const result = validateGateConfig(raw);
  if (!result.valid) {
    const summary = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigError(`${source}: ${summary}`, { errors: result.errors });
  }

  const botEmails = Array.isArray(raw.bot_emails)
    ? raw.bot_emails.filter((email): email is string => typeof email === 'string')
    : [...DEFAULT_GATE_CONFIG.botEmails];

  return {
    deployBranch: typeof raw.deploy_branch === 'string' ? raw.deploy_branch : DEFAULT_GATE_CONFIG.deployBranch,
    botEmails,
    resetWorkflow: typeof raw.reset_workflow === 'string' ? raw.reset_workflow : DEFAULT_GATE_CONFIG.resetWorkflow,
  };
}
