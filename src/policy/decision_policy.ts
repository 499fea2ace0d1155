/**
 * Decision Policy — when agents run, in what order, and what is allowed.
 *
 * Safety rules:
 * - Agents never call each other; only the runtime sequences them.
 * - Every output requires human approval; no autonomous action exists.
 * - Every decision is logged.
 *
 * All functions are pure and keep no state between requests.
 */

import { z } from "zod";
import type {
  AgentName,
  AnomalyResult,
  Composition,
  CorrectionResult,
  ResponseValidation,
} from "../shared/types.js";
import { agentForStage, getExecutionOrder as getStageOrder } from "../agents/registry.js";

export const POLICY_VERSION = "1.0.0";

export const SAFETY_NOTE = "Human approval required before action";

export function shouldCheckAnomaly(_composition?: Composition): boolean {
  return true;
}

/** Correction runs only for MEDIUM or HIGH severity. */
export function shouldRecommendAlloy(anomaly: AnomalyResult | null | undefined): boolean {
  if (!anomaly) return false;
  switch (anomaly.severity) {
    case "MEDIUM":
    case "HIGH":
      return true;
    case "LOW":
    case "ERROR":
      return false;
  }
}

export function getExecutionOrder(): AgentName[] {
  return getStageOrder().map(agentForStage);
}

export function requiresHumanApproval(
  _anomaly?: AnomalyResult | null,
  _correction?: CorrectionResult | null,
): true {
  return true;
}

export function isActionAllowed(_action: string): false {
  return false;
}

export function getSafetyNote(): string {
  return SAFETY_NOTE;
}

const explanationText = z.string().trim().min(1);

function responseSchema(agent: AgentName) {
  return z
    .object({
      agent: z.literal(agent),
      confidence: z.number().min(0).max(1),
      explanation: explanationText.optional(),
      message: explanationText.optional(),
    })
    .refine((r) => r.explanation !== undefined || r.message !== undefined, {
      message: "explanation is required",
      path: ["explanation"],
    });
}

/**
 * Check a stage response names the expected agent, carries a confidence in
 * [0, 1] and an explanation (`explanation`, or `message` for corrections).
 */
export function validateAgentResponse(agent: AgentName, response: unknown): ResponseValidation {
  const parsed = responseSchema(agent).safeParse(response);
  if (parsed.success) return { valid: true, issues: [] };
  return {
    valid: false,
    issues: parsed.error.issues.map((i) => `${i.path.join(".") || "response"}: ${i.message}`),
  };
}

/** Console trail for policy decisions. */
export function logDecision(decision: string, reason: string): void {
  console.log(`[DecisionPolicy] ${decision} - Reason: ${reason}`);
}
