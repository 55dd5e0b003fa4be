import * as core from '@actions/core';
import { ImageFailure } from './types';

/**
 * Logger on top of the Actions toolkit.
 * Debug output is promoted to info when the runner is in debug mode.
 */
export class Logger {
  public readonly verbose: boolean;
  public readonly debugMode: boolean;

  constructor(verbose: boolean = false, debugMode: boolean = false) {
    this.verbose = verbose || debugMode; // debug implies verbose
    this.debugMode = debugMode;
  }

  info(message: string): void {
    core.info(message);
  }

  warning(message: string): void {
    core.warning(message);
  }

  /**
   * Only shown when verbose is true
   */
  verboseInfo(message: string): void {
    if (this.verbose) {
      core.info(message);
    }
  }

  debug(message: string): void {
    if (this.debugMode) {
      core.info(`[DEBUG] ${message}`);
    } else {
      core.debug(message);
    }
  }

  /**
   * One image failed; annotated so it shows on the run summary page
   */
  imageFailed(image: string, message: string): void {
    core.error(`Failed to process ${image}: ${message}`, { title: `Mirror failed: ${image}` });
  }

  /**
   * List every failed image once the run is over
   */
  failureSummary(failures: readonly ImageFailure[]): void {
    if (failures.length === 0) {
      return;
    }
    core.warning(`Encountered ${failures.length} ${failures.length === 1 ? 'error' : 'errors'}`);
    for (const failure of failures) {
      core.warning(`  - ${failure.image}: ${failure.error}`);
    }
  }

  /**
   * Run fn inside a collapsible log group
   */
  async group<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return core.group(name, fn);
  }
}
