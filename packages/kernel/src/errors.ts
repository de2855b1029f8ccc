/**
 * Kiln Kernel: Error Types
 *
 * Two families of errors leave the kernel:
 *
 *   - Configuration errors (GraphConfigError and its subclasses, memo
 *     construction errors) are thrown synchronously while rules are being
 *     registered or targets assembled. They never surface during scheduling.
 *   - Fatal errors (memo authentication / format failures, interruption) stop
 *     a running build and reject the make() promise after bookkeeping.
 *
 * Rule-level failures (missing inputs, action exceptions) are not errors from
 * the caller's point of view: they are reported as events and counted in the
 * build summary.
 */

/** Base class for every error raised by the kernel. */
export class KilnError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KilnError';
  }
}

// ---------------------------------------------------------------------------
// Graph configuration
// ---------------------------------------------------------------------------

/**
 * The rule graph is malformed: zero outputs, duplicate outputs, path
 * collisions, file-kind inconsistencies, unknown rule names.
 */
export class GraphConfigError extends KilnError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GraphConfigError';
  }
}

/** Targets passed to one make() call belong to different rule stores. */
export class CrossStoreError extends GraphConfigError {
  constructor() {
    super(
      'All targets of a single build must belong to the same rule store. ' +
        'Rule ids are only meaningful within the store that assigned them.',
    );
    this.name = 'CrossStoreError';
  }
}

/** A rule is reachable from itself through its dependencies. */
export class DependencyCycleError extends GraphConfigError {
  constructor(readonly cycle: ReadonlyArray<number>) {
    super(`Dependency cycle detected among rules: ${cycle.join(' -> ')}`);
    this.name = 'DependencyCycleError';
  }
}

// ---------------------------------------------------------------------------
// Memoization
// ---------------------------------------------------------------------------

/**
 * A bound argument cannot be memoized: unsupported leaf type, cyclic
 * structure, or a value that does not survive a serialize/deserialize
 * round trip under the authenticated encoding.
 */
export class MemoSerializationError extends KilnError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MemoSerializationError';
  }
}

/** The memo factory was configured incorrectly (e.g. no key for the authenticated encoding). */
export class MemoConfigError extends KilnError {
  constructor(message: string) {
    super(message);
    this.name = 'MemoConfigError';
  }
}

/**
 * A persisted authenticated memo failed MAC verification.
 *
 * Never downgraded to "stale": a memo file that was tampered with, or written
 * under another key, stops the build.
 */
export class MemoAuthenticationError extends KilnError {
  constructor(readonly metadataPath: string) {
    super(
      `Authentication error: memo record ${metadataPath} was rejected for an invalid HMAC. ` +
        'The file was modified or written with a different key. ' +
        'Remove it (kiln clean) if the change is expected.',
    );
    this.name = 'MemoAuthenticationError';
  }
}

/** A persisted memo record was written with a different encoding than the rule now uses. */
export class MemoFormatError extends KilnError {
  constructor(
    readonly metadataPath: string,
    readonly found: string,
    readonly expected: string,
  ) {
    super(
      `Memo record ${metadataPath} uses encoding '${found}' but the rule expects '${expected}'. ` +
        'Clean the affected rules after switching memo encodings.',
    );
    this.name = 'MemoFormatError';
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** An action completed without error but did not produce all declared outputs. */
export class OutputMissingError extends KilnError {
  constructor(readonly missing: ReadonlyArray<string>) {
    super(
      `Action completed but did not create its declared outputs: ${missing.join(', ')}`,
    );
    this.name = 'OutputMissingError';
  }
}

/** The build was interrupted through its abort signal. */
export class BuildInterruptedError extends KilnError {
  constructor(readonly ruleName?: string, options?: ErrorOptions) {
    super(
      ruleName === undefined
        ? 'Build interrupted'
        : `Build interrupted while running rule '${ruleName}'`,
      options,
    );
    this.name = 'BuildInterruptedError';
  }
}
