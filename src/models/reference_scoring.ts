/**
 * Reference-profile scoring model.
 *
 * Each profile is a per-element center and scale describing one population of
 * normal melts. A reading's raw score is the negated RMS standardized distance
 * to its closest profile, so normal readings score near 0 and outliers score
 * increasingly negative. Calibration is read from the artifact and never
 * recomputed at inference time.
 */

import { ELEMENTS } from "../shared/types.js";
import type { Composition } from "../shared/types.js";
import { rms } from "../shared/stats.js";
import { ModelInferenceError, ModelNotReadyError } from "../shared/errors.js";
import type { ReferenceProfile, ScoringArtifact } from "./artifacts.js";
import type { ModelMetadata, ScoreCalibration, ScoringModel } from "./types.js";

const MODEL_NAME = "ReferenceProfileScoringModel";

export class ReferenceProfileScoringModel implements ScoringModel {
  readonly calibration: ScoreCalibration;
  private readonly profiles: readonly ReferenceProfile[];
  private readonly version: string;
  private readonly source: string;

  constructor(artifact: ScoringArtifact, source = "in-memory") {
    this.calibration = Object.freeze({
      scoreMin: artifact.calibration.score_min,
      scoreMax: artifact.calibration.score_max,
    });
    this.profiles = artifact.profiles;
    this.version = artifact.version;
    this.source = source;
  }

  isReady(): boolean {
    return true;
  }

  score(composition: Composition): number {
    let best = Number.POSITIVE_INFINITY;
    for (const profile of this.profiles) {
      const distance = profileDistance(profile, composition);
      if (distance < best) best = distance;
    }
    if (!Number.isFinite(best)) {
      throw new ModelInferenceError(MODEL_NAME, "non-finite distance to reference profiles");
    }
    return -best;
  }

  describe(): ModelMetadata {
    return {
      name: MODEL_NAME,
      version: this.version,
      ready: true,
      source: this.source,
      detail: `${this.profiles.length} reference profiles`,
    };
  }
}

/** RMS of per-element z-scores against one profile. */
export function profileDistance(profile: ReferenceProfile, composition: Composition): number {
  return rms(ELEMENTS.map((el) => (composition[el] - profile.center[el]) / profile.scale[el]));
}

/**
 * Placeholder used when no scoring artifact could be loaded.
 */
export class UnavailableScoringModel implements ScoringModel {
  readonly calibration = null;

  constructor(
    private readonly source: string,
    private readonly reason: string,
  ) {}

  isReady(): boolean {
    return false;
  }

  score(): number {
    throw new ModelNotReadyError(MODEL_NAME);
  }

  describe(): ModelMetadata {
    return { name: MODEL_NAME, version: "none", ready: false, source: this.source, detail: this.reason };
  }
}
