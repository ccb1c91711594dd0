// I/O failures are fatal: they carry the path involved and the underlying cause.

export class EntrySourceError extends Error {
  constructor(readonly source: string, cause: unknown) {
    super(`Failed to read entries from ${source}: ${describe(cause)}`, { cause });
    this.name = "EntrySourceError";
  }
}

export class StorageError extends Error {
  constructor(readonly operation: "load" | "save", readonly path: string, cause: unknown) {
    super(`Failed to ${operation} scores at ${path}: ${describe(cause)}`, { cause });
    this.name = "StorageError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
