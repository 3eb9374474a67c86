import type { ErrorInfo } from "@/types";

export class TrailsortError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidPolicyError extends TrailsortError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_POLICY", `Invalid threshold policy: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class InvalidTaxonomyError extends TrailsortError {
  constructor(message: string) {
    super("INVALID_TAXONOMY", message);
  }
}

export class ConfigurationError extends TrailsortError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class DetectorFailureError extends TrailsortError {
  constructor(message: string, cause?: unknown) {
    super("DETECTOR_FAILURE", message, { cause });
  }
}

export class DestinationExistsError extends TrailsortError {
  readonly destinationPath: string;

  constructor(destinationPath: string) {
    super("DESTINATION_EXISTS", `Destination already exists: ${destinationPath}`);
    this.destinationPath = destinationPath;
  }
}

export class MoveFailedError extends TrailsortError {
  readonly sourcePath: string;
  readonly ioCode: string | null;

  constructor(sourcePath: string, cause: unknown) {
    const ioCode = errorCodeOf(cause);
    super("MOVE_FAILED", `Failed to move ${sourcePath}: ${describeError(cause)}`, { cause });
    this.sourcePath = sourcePath;
    this.ioCode = ioCode;
  }
}

/** Node's system errors carry a string `code` such as EEXIST or EXDEV. */
export function errorCodeOf(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : null;
  }
  return null;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof TrailsortError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "UNKNOWN", message: err.message };
  return { code: "UNKNOWN", message: String(err) };
}
