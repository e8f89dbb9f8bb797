export class CliError extends Error {
  code: string;
  exitCode: number;

  constructor(message: string, code = "ERR_CLI", exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class PermissionError extends CliError {
  constructor(expectedUid: number, actualUid: number | undefined) {
    super(
      `snapshot must run as uid ${expectedUid} (current uid: ${actualUid ?? "unknown"})`,
      "ERR_PERMISSION",
      1,
    );
    this.name = "PermissionError";
  }
}

export class DirectoryCreationError extends CliError {
  path: string;

  constructor(path: string, cause: unknown) {
    super(`could not create snapshot directory ${path}: ${describe(cause)}`, "ERR_DIRECTORY_CREATE", 1);
    this.name = "DirectoryCreationError";
    this.path = path;
  }
}

export class ExportError extends CliError {
  artifact: string;

  constructor(artifact: string, cause: unknown) {
    super(`export of ${artifact} failed: ${describe(cause)}`, "ERR_EXPORT", 1);
    this.name = "ExportError";
    this.artifact = artifact;
  }
}

export class VerificationError extends CliError {
  missing: string[];

  constructor(directory: string, missing: string[]) {
    super(`snapshot ${directory} is incomplete, missing: ${missing.join(", ")}`, "ERR_VERIFY", 1);
    this.name = "VerificationError";
    this.missing = missing;
  }
}

export class WatchBackendError extends CliError {
  constructor(backend: string, cause: unknown) {
    super(`${backend} watcher stopped: ${describe(cause)}`, "ERR_WATCH_BACKEND", 1);
    this.name = "WatchBackendError";
  }
}

export class PruneError extends CliError {
  path: string;

  constructor(path: string, cause: unknown) {
    super(`could not prune ${path}: ${describe(cause)}`, "ERR_PRUNE", 1);
    this.name = "PruneError";
    this.path = path;
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
