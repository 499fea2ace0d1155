/**
 * Model artifact loading.
 *
 * A missing artifact yields a not-ready model so the service can start in a
 * degraded state; a present but malformed artifact is an error.
 */

import { existsSync, readFileSync } from "fs";
import type { z } from "zod";
import { ArtifactError, describeError } from "../shared/errors.js";
import { CorrectionArtifactSchema, ScoringArtifactSchema } from "./artifacts.js";
import { LinearCorrectionModel, UnavailableRegressionModel } from "./linear_correction.js";
import { ReferenceProfileScoringModel, UnavailableScoringModel } from "./reference_scoring.js";
import type { RegressionModel, ScoringModel } from "./types.js";

export function loadScoringModel(filePath: string): ScoringModel {
  if (!existsSync(filePath)) {
    console.warn(`[models] Scoring model not found: ${filePath}`);
    return new UnavailableScoringModel(filePath, "artifact not found");
  }
  const artifact = readArtifact(filePath, ScoringArtifactSchema);
  return new ReferenceProfileScoringModel(artifact, filePath);
}

export function loadCorrectionModel(filePath: string): RegressionModel {
  if (!existsSync(filePath)) {
    console.warn(`[models] Correction model not found: ${filePath}`);
    return new UnavailableRegressionModel(filePath, "artifact not found");
  }
  const artifact = readArtifact(filePath, CorrectionArtifactSchema);
  return new LinearCorrectionModel(artifact, filePath);
}

function readArtifact<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ArtifactError(filePath, [describeError(err)]);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactError(
      filePath,
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data;
}
