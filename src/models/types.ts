/**
 * Model capability contracts.
 *
 * The pipeline treats both trained models as black boxes: it only relies on
 * the shapes below. How they were fitted is not the pipeline's concern.
 */

import type { Composition } from "../shared/types.js";

/** Fixed min/max of the scoring model's raw output, recorded with the artifact. */
export interface ScoreCalibration {
  scoreMin: number;
  scoreMax: number;
}

export interface ModelMetadata {
  name: string;
  version: string;
  ready: boolean;
  source: string;
  detail?: string;
}

/**
 * Raw anomaly scorer. Lower raw scores mean more anomalous readings.
 */
export interface ScoringModel {
  isReady(): boolean;
  /** Null when the model is not ready. */
  readonly calibration: ScoreCalibration | null;
  score(composition: Composition): number;
  describe(): ModelMetadata;
}

/**
 * Raw correction regressor.
 *
 * Features are `[gradeId, Fe, C, Si, Mn, P, S]`; the output holds one value per
 * element in the same order. Outputs may be negative or exceed any safety cap.
 */
export interface RegressionModel {
  isReady(): boolean;
  /** Grade name → identifier learned at training time. */
  readonly gradeIds: ReadonlyMap<string, number>;
  predict(features: readonly number[]): number[];
  describe(): ModelMetadata;
}
