/**
 * Anomaly Detection Agent
 *
 * Turns the scoring model's raw output into a normalized score, a severity
 * tier and a confidence. It flags abnormal spectrometer behavior (sensor
 * drift, noise, unstable melt chemistry); it does not decide PASS/FAIL.
 */

import type { AnomalyResult, Composition, Severity } from "../shared/types.js";
import { clip } from "../shared/stats.js";
import { ModelInferenceError, ModelNotReadyError, describeError } from "../shared/errors.js";
import type { ScoreCalibration, ScoringModel } from "../models/types.js";
import type { AgentMetadata } from "./types.js";

export const ANOMALY_AGENT_NAME = "AnomalyDetectionAgent";
export const ANOMALY_AGENT_VERSION = "1.0.0";

export interface SeverityThresholds {
  medium: number;
  high: number;
}

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = { medium: 0.33, high: 0.66 };

const EXPLANATIONS: Record<Exclude<Severity, "ERROR">, string> = {
  LOW:
    "Detected deviation from historical composition distribution. " +
    "Reading is within normal operational variance.",
  MEDIUM:
    "Moderate anomaly detected in composition pattern. " +
    "Recommend verifying sensor calibration and melt stability.",
  HIGH:
    "High anomaly detected - composition significantly deviates from historical patterns. " +
    "Possible sensor drift, contamination, or unstable melt chemistry. Human inspection recommended.",
};

/** Map raw score to [0, 1]; lower raw scores are more anomalous. */
export function normalizeScore(raw: number, calibration: ScoreCalibration): number {
  const { scoreMin, scoreMax } = calibration;
  return clip((scoreMax - raw) / (scoreMax - scoreMin), 0, 1);
}

export function classifySeverity(
  score: number,
  thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS,
): Exclude<Severity, "ERROR"> {
  if (score >= thresholds.high) return "HIGH";
  if (score >= thresholds.medium) return "MEDIUM";
  return "LOW";
}

/** Highest at the extremes, zero at the ambiguous midpoint. */
export function calculateConfidence(score: number): number {
  return clip(2 * Math.abs(score - 0.5), 0, 1);
}

export function explainSeverity(severity: Exclude<Severity, "ERROR">): string {
  return EXPLANATIONS[severity];
}

export class AnomalyDetectionAgent {
  private readonly calibration: ScoreCalibration | null;

  constructor(
    private readonly model: ScoringModel,
    private readonly thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS,
  ) {
    if (thresholds.medium >= thresholds.high) {
      throw new Error(
        `Severity thresholds out of order: medium ${thresholds.medium} >= high ${thresholds.high}`,
      );
    }
    const calibration = model.isReady() ? model.calibration : null;
    if (calibration && !(calibration.scoreMax > calibration.scoreMin)) {
      throw new Error(
        `Degenerate score calibration: max ${calibration.scoreMax} <= min ${calibration.scoreMin}`,
      );
    }
    this.calibration = calibration ? Object.freeze({ ...calibration }) : null;
  }

  isReady(): boolean {
    return this.calibration !== null && this.model.isReady();
  }

  /**
   * Evaluate one composition.
   * Throws ModelNotReadyError or ModelInferenceError; callers isolate both.
   */
  evaluate(composition: Composition): AnomalyResult {
    if (!this.isReady() || this.calibration === null) {
      throw new ModelNotReadyError(ANOMALY_AGENT_NAME);
    }

    let raw: number;
    try {
      raw = this.model.score(composition);
    } catch (err) {
      if (err instanceof ModelNotReadyError || err instanceof ModelInferenceError) throw err;
      throw new ModelInferenceError(ANOMALY_AGENT_NAME, describeError(err));
    }
    if (!Number.isFinite(raw)) {
      throw new ModelInferenceError(ANOMALY_AGENT_NAME, `non-finite raw score ${raw}`);
    }

    const score = normalizeScore(raw, this.calibration);
    const severity = classifySeverity(score, this.thresholds);

    return Object.freeze({
      agent: ANOMALY_AGENT_NAME,
      score,
      severity,
      confidence: calculateConfidence(score),
      explanation: explainSeverity(severity),
    });
  }

  metadata(): AgentMetadata {
    return {
      agentName: ANOMALY_AGENT_NAME,
      version: ANOMALY_AGENT_VERSION,
      purpose: "Detect abnormal spectrometer behavior",
      ready: this.isReady(),
      stateless: true,
      deterministic: true,
      autonomous: false,
      model: this.model.describe(),
    };
  }
}

/** ERROR-tagged result substituted when the stage fails. */
export function anomalyErrorResult(reason: string): AnomalyResult {
  return Object.freeze({
    agent: ANOMALY_AGENT_NAME,
    score: 0,
    severity: "ERROR",
    confidence: 0,
    explanation: `Anomaly evaluation failed: ${reason}`,
  });
}
