/**
 * AgentRuntime — Orchestrates one analysis per request.
 *
 * Runs stages in the registry's topological order, gates the correction stage
 * through the decision policy, turns any stage failure into an ERROR-tagged
 * result for that stage only, and appends one audit record per stage.
 * Agents never see each other; only this class sequences them.
 */

import { v4 as uuidv4 } from "uuid";
import type { AdvisorContext } from "../context.js";
import type {
  AgentName,
  AnalysisRequest,
  AnalysisResult,
  AnomalyResult,
  Composition,
  CorrectionResult,
  DecisionOutcome,
  ResponseValidation,
  StageType,
} from "../shared/types.js";
import { InvalidCompositionError, describeError } from "../shared/errors.js";
import { parseAnalysisRequest, parseComposition } from "../input/schemas.js";
import {
  POLICY_VERSION,
  getExecutionOrder as getAgentOrder,
  getSafetyNote,
  logDecision,
  requiresHumanApproval,
  shouldCheckAnomaly,
  shouldRecommendAlloy,
  validateAgentResponse,
} from "../policy/decision_policy.js";
import { ANOMALY_AGENT_NAME, anomalyErrorResult } from "./anomaly_agent.js";
import { ALLOY_AGENT_NAME, correctionErrorResult, notInvokedResult } from "./alloy_agent.js";
import { getExecutionOrder } from "./registry.js";
import type {
  AnomalyOutcome,
  BatchItemResult,
  CorrectionOutcome,
  RuntimeStatus,
} from "./types.js";

export class AgentRuntime {
  constructor(private readonly context: AdvisorContext) {}

  /**
   * Full pipeline: anomaly check, policy gate, optional correction.
   * Only input validation throws (InvalidCompositionError).
   */
  analyze(input: unknown): AnalysisResult {
    const request = parseAnalysisRequest(input);
    const requestId = uuidv4();

    let anomaly: AnomalyOutcome | null = null;
    let correction: CorrectionOutcome | null = null;

    for (const stage of getExecutionOrder()) {
      switch (stage) {
        case "ANOMALY_CHECK":
          anomaly = this.runAnomalyStage(requestId, request.composition);
          break;
        case "ALLOY_RECOMMENDATION":
          correction = this.runGatedCorrectionStage(requestId, request, anomaly);
          break;
      }
    }

    if (!anomaly || !correction) {
      throw new Error("Stage registry did not schedule every stage");
    }

    return Object.freeze({
      requestId,
      grade: request.grade,
      anomaly: anomaly.result,
      correction: correction.result,
      correctionStatus: correction.status,
      validation: {
        anomaly: this.validate(ANOMALY_AGENT_NAME, anomaly.result),
        correction:
          correction.status === "skipped" ? null : this.validate(ALLOY_AGENT_NAME, correction.result),
      },
      requiresHumanApproval: requiresHumanApproval(anomaly.result, correction.result),
      safetyNote: getSafetyNote(),
      timestamp: new Date().toISOString(),
    });
  }

  /** Anomaly stage alone. */
  evaluateAnomaly(composition: unknown): AnomalyResult {
    const parsed = parseComposition(composition);
    const outcome = this.runAnomalyStage(uuidv4(), parsed);
    this.validate(ANOMALY_AGENT_NAME, outcome.result);
    return outcome.result;
  }

  /** Correction stage alone, without the severity gate. */
  recommendCorrection(grade: string, composition: unknown): CorrectionResult {
    const request = parseAnalysisRequest({ grade, composition });
    const outcome = this.runCorrectionStage(uuidv4(), request);
    this.validate(ALLOY_AGENT_NAME, outcome.result);
    return outcome.result;
  }

  /**
   * Analyze readings independently. An invalid reading is rejected on its own;
   * the rest of the batch still runs.
   */
  analyzeBatch(inputs: readonly unknown[]): BatchItemResult<AnalysisResult>[] {
    return inputs.map((input, index): BatchItemResult<AnalysisResult> => {
      try {
        return { index, status: "analyzed", result: this.analyze(input) };
      } catch (err) {
        if (err instanceof InvalidCompositionError) {
          return { index, status: "rejected", error: err.message, issues: err.issues };
        }
        throw err;
      }
    });
  }

  isReady(): boolean {
    return this.context.anomalyAgent.isReady() && this.context.alloyAgent.isReady();
  }

  getStatus(): RuntimeStatus {
    return {
      ready: this.isReady(),
      policyVersion: POLICY_VERSION,
      executionOrder: getAgentOrder(),
      grades: this.context.grades.listGrades(),
      agents: {
        anomaly: this.context.anomalyAgent.metadata(),
        alloy: this.context.alloyAgent.metadata(),
      },
    };
  }

  // ── Stages ───────────────────────────────────────────────────────

  private runAnomalyStage(requestId: string, composition: Composition): AnomalyOutcome {
    if (!shouldCheckAnomaly(composition)) {
      throw new Error("Decision policy disabled the anomaly check");
    }

    let outcome: AnomalyOutcome;
    try {
      const result = this.context.anomalyAgent.evaluate(composition);
      outcome = { status: "success", result };
    } catch (err) {
      const error = describeError(err);
      outcome = { status: "failed", result: anomalyErrorResult(error), error };
    }

    const reason =
      outcome.status === "success"
        ? `Severity: ${outcome.result.severity}, Score: ${outcome.result.score.toFixed(3)}`
        : `Anomaly evaluation failed: ${outcome.error}`;
    this.record(requestId, "ANOMALY_CHECK", outcome.status, reason);
    return outcome;
  }

  private runGatedCorrectionStage(
    requestId: string,
    request: AnalysisRequest,
    anomaly: AnomalyOutcome | null,
  ): CorrectionOutcome {
    if (shouldRecommendAlloy(anomaly?.result)) {
      return this.runCorrectionStage(requestId, request);
    }

    const severity = anomaly?.result.severity ?? "none";
    const reason = `Anomaly severity ${severity}; correction requires MEDIUM or HIGH`;
    this.record(requestId, "ALLOY_RECOMMENDATION", "skipped", reason);
    return { status: "skipped", result: notInvokedResult(), reason };
  }

  private runCorrectionStage(requestId: string, request: AnalysisRequest): CorrectionOutcome {
    let outcome: CorrectionOutcome;
    try {
      const result = this.context.alloyAgent.recommend(request.grade, request.composition);
      outcome = { status: "success", result };
    } catch (err) {
      const error = describeError(err);
      outcome = { status: "failed", result: correctionErrorResult(error), error };
    }

    const reason =
      outcome.status === "failed"
        ? `Alloy recommendation failed: ${outcome.error}`
        : `Grade ${request.grade}: ${Object.keys(outcome.result.additions).length} additions, ` +
          `confidence ${outcome.result.confidence.toFixed(3)}`;
    this.record(requestId, "ALLOY_RECOMMENDATION", outcome.status, reason);
    return outcome;
  }

  // ── Helpers ──────────────────────────────────────────────────────

  private validate(agent: AgentName, response: unknown): ResponseValidation {
    const validation = validateAgentResponse(agent, response);
    if (!validation.valid) {
      console.warn(`[AgentRuntime] Invalid ${agent} response: ${validation.issues.join("; ")}`);
    }
    return validation;
  }

  private record(
    requestId: string,
    decision: StageType,
    outcome: DecisionOutcome,
    reason: string,
  ): void {
    this.context.audit.append({ requestId, decision, outcome, reason });
    if (this.context.config.logDecisions) {
      logDecision(decision, reason);
    }
  }
}
