import { z } from "zod";
import { ELEMENTS } from "../shared/types.js";
import type { GradeSpec } from "../shared/types.js";

// ── Persisted grade table ──────────────────────────────────────────
// { [grade]: { grade, description, composition_ranges: { [element]: [min, max] } } }

export const ElementSchema = z.enum(ELEMENTS);

export const ElementRangeSchema = z
  .tuple([z.number().min(0).max(100), z.number().min(0).max(100)])
  .refine(([min, max]) => min <= max, { message: "min must not exceed max" });

export const GradeSpecRecordSchema = z.object({
  grade: z.string().min(1),
  description: z.string().default(""),
  composition_ranges: z.record(ElementSchema, ElementRangeSchema),
});

export type GradeSpecRecord = z.infer<typeof GradeSpecRecordSchema>;

export const GradeTableSchema = z
  .record(z.string().min(1), GradeSpecRecordSchema)
  .superRefine((table, ctx) => {
    for (const [key, spec] of Object.entries(table)) {
      if (spec.grade !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, "grade"],
          message: `grade "${spec.grade}" does not match its key "${key}"`,
        });
      }
    }
  });

export type GradeTable = z.infer<typeof GradeTableSchema>;

export function toGradeSpec(record: GradeSpecRecord): GradeSpec {
  return {
    grade: record.grade,
    description: record.description,
    compositionRanges: { ...record.composition_ranges },
  };
}

export function toGradeSpecRecord(spec: GradeSpec): GradeSpecRecord {
  const ranges: GradeSpecRecord["composition_ranges"] = {};
  for (const el of ELEMENTS) {
    const range = spec.compositionRanges[el];
    if (range) ranges[el] = [range[0], range[1]];
  }
  return { grade: spec.grade, description: spec.description, composition_ranges: ranges };
}
