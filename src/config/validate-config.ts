/**
 * Validates the optional deploy-gate.yaml configuration file
 */

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const KNOWN_KEYS = ['deploy_branch', 'bot_emails', 'reset_workflow'];

/**
 * Validate a parsed deploy-gate.yaml object
 */
export function validateGateConfig(raw: Record<string, unknown>): ValidationResult {
  const errors: ValidationError[] = [];

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({ path: key, message: `Unknown setting "${key}". Must be one of: ${KNOWN_KEYS.join(', ')}` });
    }
  }

  if (raw.deploy_branch !== undefined) {
    if (typeof raw.deploy_branch !== 'string' || raw.deploy_branch.trim() === '') {
      errors.push({ path: 'deploy_branch', message: '"deploy_branch" must be a non-empty string' });
    } else if (raw.deploy_branch.startsWith('refs/')) {
      errors.push({ path: 'deploy_branch', message: '"deploy_branch" must be a branch name, not a full ref' });
    }
  }

  if (raw.bot_emails !== undefined) {
    if (!Array.isArray(raw.bot_emails) || raw.bot_emails.length === 0) {
      errors.push({ path: 'bot_emails', message: 'Missing or empty "bot_emails" array' });
    } else {
      raw.bot_emails.forEach((email: unknown, index: number) => {
        if (typeof email !== 'string' || !email.includes('@')) {
          errors.push({ path: `bot_emails.${index}`, message: 'Must be an email address' });
        }
      });
    }
  }

  if (raw.reset_workflow !== undefined) {
    if (typeof raw.reset_workflow !== 'string' || !/\.ya?ml$/.test(raw.reset_workflow)) {
      errors.push({ path: 'reset_workflow', message: '"reset_workflow" must be a workflow file name ending in .yml or .yaml' });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
