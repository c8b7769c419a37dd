import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';

/**
 * Output and error channels of a GitHub Actions step
 */
export interface ActionsOutput {
  setOutput(name: string, value: string): void;
  reportError(message: string): void;
}

/**
 * Escape data for a workflow command (`::error::...`)
 */
export function escapeCommandData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

/**
 * Format an entry for the GITHUB_OUTPUT file using a heredoc delimiter,
 * which keeps multi-line and quote-laden values intact.
 */
export function formatOutputEntry(name: string, value: string, delimiter: string): string {
  if (name.includes(delimiter) || value.includes(delimiter)) {
    throw new Error(`Output delimiter ${delimiter} collides with output "${name}"`);
  }
  return `${name}<<${delimiter}${os.EOL}${value}${os.EOL}${delimiter}${os.EOL}`;
}

/**
 * Channel writing to the runner: GITHUB_OUTPUT when available, workflow
 * commands on stdout otherwise.
 */
export class RunnerOutput implements ActionsOutput {
  constructor(
    private readonly outputFile: string | undefined,
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {}

  setOutput(name: string, value: string): void {
    if (this.outputFile) {
      const delimiter = `ghadelimiter_${crypto.randomUUID()}`;
      fs.appendFileSync(this.outputFile, formatOutputEntry(name, value, delimiter), 'utf8');
      return;
    }
    this.write(`::set-output name=${name}::${escapeCommandData(value)}`);
  }

  reportError(message: string): void {
    this.write(`::error::${escapeCommandData(message)}`);
  }
}
