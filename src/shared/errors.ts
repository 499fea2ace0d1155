/**
 * Advisor error taxonomy.
 *
 * Only INVALID_COMPOSITION ever reaches the caller of an analysis; every other
 * code is recovered inside the agent runtime and turned into a tagged stage result.
 */

export type AdvisorErrorCode =
  | "INVALID_COMPOSITION"
  | "UNKNOWN_GRADE"
  | "MODEL_NOT_READY"
  | "MODEL_INFERENCE"
  | "ARTIFACT"
  | "CONFIG";

export class AdvisorError extends Error {
  public readonly code: AdvisorErrorCode;
  public readonly details?: unknown;

  constructor(code: AdvisorErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidCompositionError extends AdvisorError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_COMPOSITION", `Invalid composition: ${issues.join("; ")}`, issues);
    this.issues = issues;
  }
}

export class UnknownGradeError extends AdvisorError {
  public readonly grade: string;

  constructor(grade: string, available: readonly string[]) {
    super("UNKNOWN_GRADE", `Unknown grade: ${grade}. Available grades: ${available.join(", ")}`);
    this.grade = grade;
  }
}

export class ModelNotReadyError extends AdvisorError {
  constructor(model: string) {
    super("MODEL_NOT_READY", `${model} is not ready`);
  }
}

export class ModelInferenceError extends AdvisorError {
  constructor(model: string, reason: string) {
    super("MODEL_INFERENCE", `${model} inference failed: ${reason}`);
  }
}

export class ArtifactError extends AdvisorError {
  constructor(filePath: string, issues: string[]) {
    super("ARTIFACT", `Invalid artifact ${filePath}: ${issues.join("; ")}`, issues);
  }
}

export class ConfigError extends AdvisorError {
  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`, issues);
  }
}

/** Human-readable reason for any thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
