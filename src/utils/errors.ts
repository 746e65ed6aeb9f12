/**
 * Error taxonomy shared by the scheduler, executors and polling loops
 */

/**
 * Unresolvable storage, invalid storage settings or an unusable schedule.
 * The affected item is skipped; the loop keeps going.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A dump, restore or mount command exited non-zero
 */
export class ExternalToolError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(message);
    this.name = "ExternalToolError";
  }
}

/**
 * A storage operation, agent call or webhook delivery failed
 */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * A stored credential could not be decrypted with the configured key
 */
export class DecryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecryptionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
