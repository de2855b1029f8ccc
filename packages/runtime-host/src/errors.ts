/**
 * Kiln Runtime Host: Error Types
 */

import { KilnError } from '@kiln/kernel';

/**
 * A configuration value is invalid. `source` names where it came from
 * (a CLI flag, an environment variable, or the config file).
 */
export class ConfigError extends KilnError {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`Invalid configuration (${source}): ${message}`);
    this.name = 'ConfigError';
  }
}

/** An action failed inside a worker process, or the worker died before replying. */
export class IsolatedActionError extends KilnError {
  constructor(
    message: string,
    /** Stack trace captured in the worker process, when it sent one. */
    readonly remoteStack: string | null = null,
  ) {
    super(message);
    this.name = 'IsolatedActionError';
  }
}
