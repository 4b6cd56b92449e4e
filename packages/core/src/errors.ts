/**
 * A rules oracle broke its contract (e.g. `apply` on an unchecked move, or a
 * transition that did not hand the move to the other side). Never a
 * game-domain condition: it must reach the caller.
 */
export class OracleInvariantViolation extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleInvariantViolation";
  }
}

/** A configuration value could not be used as given. */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}
