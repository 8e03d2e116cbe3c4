import * as core from '@actions/core';

/**
 * Progress notices emitted by the workflows. Results are returned, not
 * printed; rendering them is up to the command layer.
 */
export interface Output {
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
}

export function isGitHubActions(): boolean {
  return process.env.GITHUB_ACTIONS === 'true';
}

export class CoreOutput implements Output {
  constructor(private readonly quiet = false) {}

  step(message: string): void {
    this.progress(`-> ${message}`);
  }

  info(message: string): void {
    this.progress(`   ${message}`);
  }

  success(message: string): void {
    this.progress(`OK ${message}`);
  }

  warning(message: string): void {
    if (isGitHubActions()) {
      core.warning(message);
    } else if (this.quiet) {
      this.debug(`WARNING ${message}`);
    } else {
      core.info(`WARNING ${message}`);
    }
  }

  private progress(line: string): void {
    if (this.quiet) {
      this.debug(line);
    } else {
      core.info(line);
    }
  }

  // core.debug writes to stdout too; under --json it stays silent unless debugging is on
  private debug(line: string): void {
    if (core.isDebug()) {
      core.debug(line);
    }
  }
}
