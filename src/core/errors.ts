export type SynthErrorSeverity = "fatal" | "recoverable" | "warning";

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID", "CONFIG_SECRET_MISSING"] as const;

export const STRUCTURE_ERROR_CODES = ["STRUCTURE_MKDIR_FAILED", "STRUCTURE_PATH_CONFLICT"] as const;

export const CONTENT_ERROR_CODES = ["CONTENT_WRITE_FAILED"] as const;

export const ARTIFACT_ERROR_CODES = [
  "ARTIFACT_TEMPLATE_MISSING",
  "ARTIFACT_PLACEHOLDER_UNKNOWN",
  "ARTIFACT_UNKNOWN",
] as const;

export const VCS_ERROR_CODES = [
  "VCS_INIT_FAILED",
  "VCS_IDENTITY_FAILED",
  "VCS_STAGE_FAILED",
  "VCS_COMMIT_FAILED",
] as const;

export const SYSTEM_ERROR_CODES = ["UNKNOWN_ERROR", "DISK_SPACE_LOW"] as const;

export const SYNTH_ERROR_CODES = [
  ...CONFIG_ERROR_CODES,
  ...STRUCTURE_ERROR_CODES,
  ...CONTENT_ERROR_CODES,
  ...ARTIFACT_ERROR_CODES,
  ...VCS_ERROR_CODES,
  ...SYSTEM_ERROR_CODES,
] as const;

export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type StructureErrorCode = (typeof STRUCTURE_ERROR_CODES)[number];
export type ContentErrorCode = (typeof CONTENT_ERROR_CODES)[number];
export type ArtifactErrorCode = (typeof ARTIFACT_ERROR_CODES)[number];
export type VcsErrorCode = (typeof VCS_ERROR_CODES)[number];
export type SystemErrorCode = (typeof SYSTEM_ERROR_CODES)[number];
export type SynthErrorCode = (typeof SYNTH_ERROR_CODES)[number];

export interface SynthErrorOptions {
  severity?: SynthErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class SynthError extends Error {
  public readonly code: SynthErrorCode;
  public readonly severity: SynthErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: SynthErrorCode,
    severity: SynthErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "SynthError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: SynthErrorCode,
  message: string,
  defaultSeverity: SynthErrorSeverity,
  options: SynthErrorOptions = {},
): SynthError {
  return new SynthError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: SynthErrorOptions = {},
): SynthError {
  return createError(code, message, "fatal", options);
}

export function structureError(
  code: StructureErrorCode,
  message: string,
  options: SynthErrorOptions = {},
): SynthError {
  return createError(code, message, "recoverable", options);
}

export function contentError(
  code: ContentErrorCode,
  message: string,
  options: SynthErrorOptions = {},
): SynthError {
  return createError(code, message, "recoverable", options);
}

export function artifactError(
  code: ArtifactErrorCode,
  message: string,
  options: SynthErrorOptions = {},
): SynthError {
  return createError(code, message, "recoverable", options);
}

export function vcsError(
  code: VcsErrorCode,
  message: string,
  options: SynthErrorOptions = {},
): SynthError {
  return createError(code, message, "recoverable", options);
}

export function isConfigError(error: unknown): boolean {
  return error instanceof SynthError && error.code.startsWith("CONFIG_");
}

/**
 * Coerce anything thrown into a `SynthError`. A full disk (`ENOSPC`) maps to
 * `DISK_SPACE_LOW`; everything else becomes `UNKNOWN_ERROR`.
 */
export function normalizeError(error: unknown): SynthError {
  if (error instanceof SynthError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const errnoCode = readErrnoCode(error);
  if (errnoCode === "ENOSPC") {
    return createError("DISK_SPACE_LOW", message, "recoverable", { cause: error });
  }

  return createError("UNKNOWN_ERROR", message, "recoverable", {
    context: errnoCode ? { errno: errnoCode } : undefined,
    cause: error,
  });
}

function readErrnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
}
