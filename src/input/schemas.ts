import { z } from "zod";
import type { AnalysisRequest, Composition } from "../shared/types.js";
import { InvalidCompositionError } from "../shared/errors.js";

// ── Composition ────────────────────────────────────────────────────

const percentage = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite().min(0).max(100),
);

export const CompositionSchema = z.object({
  Fe: percentage,
  C: percentage,
  Si: percentage,
  Mn: percentage,
  P: percentage,
  S: percentage,
});

// ── Analysis Request ───────────────────────────────────────────────

export const AnalysisRequestSchema = z.object({
  composition: CompositionSchema,
  grade: z.string().trim().min(1),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
}

/**
 * Validate a raw composition. The returned object is frozen.
 */
export function parseComposition(input: unknown): Composition {
  const result = CompositionSchema.safeParse(input);
  if (!result.success) throw new InvalidCompositionError(formatIssues(result.error));
  return Object.freeze(result.data);
}

/**
 * Validate a raw `{ composition, grade }` request before any stage runs.
 */
export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const result = AnalysisRequestSchema.safeParse(input);
  if (!result.success) throw new InvalidCompositionError(formatIssues(result.error));
  return Object.freeze({
    composition: Object.freeze(result.data.composition),
    grade: result.data.grade,
  });
}
