/**
 * Alloy Correction Agent
 *
 * Answers "what alloy additions would bring this melt back toward its grade?"
 * Raw regression output is floored at zero, capped per element and filtered
 * below a significance floor before it is surfaced. Advisory only: it never
 * modifies the composition or triggers an action.
 */

import { ELEMENTS } from "../shared/types.js";
import type { Composition, CorrectionResult, ElementMap } from "../shared/types.js";
import { clip, round, sum } from "../shared/stats.js";
import { ModelInferenceError, ModelNotReadyError, describeError } from "../shared/errors.js";
import type { GradeRegistry } from "../grades/registry.js";
import type { RegressionModel } from "../models/types.js";
import type { AgentMetadata } from "./types.js";

export const ALLOY_AGENT_NAME = "AlloyCorrectionAgent";
export const ALLOY_AGENT_VERSION = "1.0.0";

/** Total addition above which a re-melt or blend is suggested instead. */
export const LARGE_TOTAL_ADDITION = 3.0;

/** Additions above this count as a needed correction in the confidence score. */
const CORRECTION_NEEDED_THRESHOLD = 0.01;

export interface CorrectionLimits {
  maxAdditionPercentage: number;
  significanceFloor: number;
  minConfidenceThreshold: number;
}

export const DEFAULT_CORRECTION_LIMITS: CorrectionLimits = {
  maxAdditionPercentage: 5.0,
  significanceFloor: 0.01,
  minConfidenceThreshold: 0.5,
};

export const CORRECTION_MESSAGES = {
  noAction: "Composition is close to target. No significant additions needed.",
  high: "High confidence recommendation. Additions should bring composition into spec.",
  moderate: "Moderate confidence. Consider verifying with metallurgical expert.",
  low: "Low confidence. Large corrections needed. Manual review recommended.",
} as const;

/** Feature layout shared with the regression model: [gradeId, Fe, C, Si, Mn, P, S]. */
export function buildFeatureVector(gradeId: number, composition: Composition): number[] {
  return [gradeId, ...ELEMENTS.map((el) => composition[el])];
}

/**
 * Floor at 0, cap at the per-element maximum, round to 4 places and drop
 * anything under the significance floor.
 */
export function constrainAdditions(
  raw: readonly number[],
  limits: Pick<CorrectionLimits, "maxAdditionPercentage" | "significanceFloor">,
): ElementMap<number> {
  const additions: ElementMap<number> = {};
  ELEMENTS.forEach((el, i) => {
    const value = round(clip(raw[i], 0, limits.maxAdditionPercentage), 4);
    if (value > 0 && value >= limits.significanceFloor) {
      additions[el] = value;
    }
  });
  return additions;
}

/**
 * Weighted confidence:
 *   0.4 · (1 − min(total/5, 1))
 * + 0.3 · (1 − needed/elements)
 * + 0.3 · (1 − min(|deviation|/10, 1))
 */
export function calculateCorrectionConfidence(
  additions: ElementMap<number>,
  composition: Composition,
  midpoints: ElementMap<number>,
): number {
  const values = additionValues(additions);
  const additionFactor = 1 - Math.min(sum(values) / 5, 1);

  const needed = values.filter((v) => v > CORRECTION_NEEDED_THRESHOLD).length;
  const correctionFactor = 1 - needed / ELEMENTS.length;

  let totalDeviation = 0;
  for (const el of ELEMENTS) {
    const mid = midpoints[el];
    if (mid !== undefined) totalDeviation += Math.abs(composition[el] - mid);
  }
  const deviationFactor = 1 - Math.min(totalDeviation / 10, 1);

  return clip(0.4 * additionFactor + 0.3 * correctionFactor + 0.3 * deviationFactor, 0, 1);
}

function additionValues(additions: ElementMap<number>): number[] {
  return ELEMENTS.flatMap((el) => {
    const value = additions[el];
    return value === undefined ? [] : [value];
  });
}

export function correctionMessage(additions: ElementMap<number>, confidence: number): string {
  if (Object.keys(additions).length === 0) return CORRECTION_MESSAGES.noAction;
  if (confidence >= 0.8) return CORRECTION_MESSAGES.high;
  if (confidence >= 0.6) return CORRECTION_MESSAGES.moderate;
  return CORRECTION_MESSAGES.low;
}

export function correctionWarning(
  additions: ElementMap<number>,
  confidence: number,
  minConfidenceThreshold: number,
): string | null {
  if (sum(additionValues(additions)) > LARGE_TOTAL_ADDITION) {
    return `Large total addition required (>${LARGE_TOTAL_ADDITION}%). Consider re-melting or blending.`;
  }
  if (confidence < minConfidenceThreshold) {
    return `Confidence below threshold (${minConfidenceThreshold}). Use with caution.`;
  }
  return null;
}

export class AlloyCorrectionAgent {
  constructor(
    private readonly model: RegressionModel,
    private readonly grades: GradeRegistry,
    private readonly limits: CorrectionLimits = DEFAULT_CORRECTION_LIMITS,
  ) {}

  isReady(): boolean {
    return this.model.isReady();
  }

  trainedGrades(): string[] {
    return [...this.model.gradeIds.keys()];
  }

  /**
   * Recommend additions for one composition.
   * An unknown grade is answered with an empty recommendation, not an error.
   */
  recommend(grade: string, composition: Composition): CorrectionResult {
    if (!this.isReady()) {
      throw new ModelNotReadyError(ALLOY_AGENT_NAME);
    }

    const gradeId = this.model.gradeIds.get(grade);
    if (gradeId === undefined || !this.grades.hasGrade(grade)) {
      return unknownGradeResult(grade, this.trainedGrades());
    }

    let raw: number[];
    try {
      raw = this.model.predict(buildFeatureVector(gradeId, composition));
    } catch (err) {
      if (err instanceof ModelNotReadyError || err instanceof ModelInferenceError) throw err;
      throw new ModelInferenceError(ALLOY_AGENT_NAME, describeError(err));
    }
    if (raw.length !== ELEMENTS.length) {
      throw new ModelInferenceError(
        ALLOY_AGENT_NAME,
        `expected ${ELEMENTS.length} outputs, got ${raw.length}`,
      );
    }
    if (raw.some((v) => !Number.isFinite(v))) {
      throw new ModelInferenceError(ALLOY_AGENT_NAME, "prediction contains non-finite values");
    }

    const additions = constrainAdditions(raw, this.limits);
    const confidence = calculateCorrectionConfidence(
      additions,
      composition,
      this.grades.getMidpoint(grade),
    );

    return Object.freeze({
      agent: ALLOY_AGENT_NAME,
      additions: Object.freeze(additions),
      confidence,
      message: correctionMessage(additions, confidence),
      warning: correctionWarning(additions, confidence, this.limits.minConfidenceThreshold),
    });
  }

  metadata(): AgentMetadata {
    return {
      agentName: ALLOY_AGENT_NAME,
      version: ALLOY_AGENT_VERSION,
      purpose: "Recommend alloy additions toward the grade midpoint",
      ready: this.isReady(),
      stateless: true,
      deterministic: true,
      autonomous: false,
      model: this.model.describe(),
    };
  }
}

export function unknownGradeResult(grade: string, available: readonly string[]): CorrectionResult {
  return Object.freeze({
    agent: ALLOY_AGENT_NAME,
    additions: {},
    confidence: 0,
    message: `Unknown grade: ${grade}. Available grades: ${available.join(", ")}`,
    warning: `Grade not in training data: ${grade}`,
  });
}

/** Placeholder used when the policy gate does not invoke the agent. */
export function notInvokedResult(): CorrectionResult {
  return Object.freeze({
    agent: ALLOY_AGENT_NAME,
    additions: {},
    confidence: 0,
    message: "Not invoked - anomaly severity below threshold (must be MEDIUM or HIGH)",
    warning: null,
  });
}

/** ERROR-tagged result substituted when the stage fails. */
export function correctionErrorResult(reason: string): CorrectionResult {
  return Object.freeze({
    agent: ALLOY_AGENT_NAME,
    additions: {},
    confidence: 0,
    message: `Alloy recommendation failed: ${reason}`,
    warning: "No recommendation available. Manual review required.",
  });
}
