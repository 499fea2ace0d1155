import { z } from "zod";
import { ELEMENTS } from "../shared/types.js";

// ── Shared ─────────────────────────────────────────────────────────

const ElementOrderSchema = z
  .array(z.enum(ELEMENTS))
  .refine((els) => els.length === ELEMENTS.length && els.every((el, i) => el === ELEMENTS[i]), {
    message: `element order must be ${ELEMENTS.join(", ")}`,
  });

const elementValues = (value: z.ZodNumber) =>
  z.object({
    Fe: value,
    C: value,
    Si: value,
    Mn: value,
    P: value,
    S: value,
  });

const vector = z.array(z.number()).length(ELEMENTS.length);

// ── Scoring model artifact ─────────────────────────────────────────

export const ReferenceProfileSchema = z.object({
  label: z.string().min(1),
  center: elementValues(z.number()),
  scale: elementValues(z.number().positive()),
});

export type ReferenceProfile = z.infer<typeof ReferenceProfileSchema>;

export const ScoringArtifactSchema = z
  .object({
    model: z.literal("reference-profile"),
    version: z.string().min(1),
    elements: ElementOrderSchema,
    calibration: z.object({
      score_min: z.number(),
      score_max: z.number(),
    }),
    profiles: z.array(ReferenceProfileSchema).min(1),
  })
  .refine((a) => a.calibration.score_max > a.calibration.score_min, {
    message: "calibration.score_max must exceed calibration.score_min",
    path: ["calibration"],
  });

export type ScoringArtifact = z.infer<typeof ScoringArtifactSchema>;

// ── Correction model artifact ──────────────────────────────────────

export const CorrectionBlockSchema = z.object({
  grade_id: z.number().int().nonnegative(),
  intercept: vector,
  coefficients: z.array(vector).length(ELEMENTS.length),
});

export type CorrectionBlock = z.infer<typeof CorrectionBlockSchema>;

export const CorrectionArtifactSchema = z
  .object({
    model: z.literal("linear-correction"),
    version: z.string().min(1),
    elements: ElementOrderSchema,
    grades: z.record(z.string().min(1), z.number().int().nonnegative()),
    blocks: z.array(CorrectionBlockSchema).min(1),
  })
  .superRefine((a, ctx) => {
    const blockIds = new Set(a.blocks.map((b) => b.grade_id));
    for (const [grade, id] of Object.entries(a.grades)) {
      if (!blockIds.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["grades", grade],
          message: `no coefficient block for grade id ${id}`,
        });
      }
    }
  });

export type CorrectionArtifact = z.infer<typeof CorrectionArtifactSchema>;
