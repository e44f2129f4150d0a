/** Missing or invalid configuration, detected before any request is made. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A snapshot file exists but cannot be read as the expected document. */
export class SnapshotError extends Error {
  constructor(
    public readonly snapshot: string,
    message: string
  ) {
    super(`Invalid snapshot "${snapshot}": ${message}`);
    this.name = "SnapshotError";
  }
}
