/**
 * Agent Types
 *
 * Each pipeline stage is an agent whose outcome is a tagged variant. The
 * runtime switches on `status`; it never probes result fields to guess what
 * happened.
 */

import type {
  AgentName,
  AnomalyResult,
  CorrectionResult,
  StageType,
} from "../shared/types.js";
import type { ModelMetadata } from "../models/types.js";

// ── Stage Outcomes ─────────────────────────────────────────────────

export type AnomalyOutcome =
  | { status: "success"; result: AnomalyResult }
  | { status: "failed"; result: AnomalyResult; error: string };

export type CorrectionOutcome =
  | { status: "success"; result: CorrectionResult }
  | { status: "skipped"; result: CorrectionResult; reason: string }
  | { status: "failed"; result: CorrectionResult; error: string };

// ── Stage Definition (Registry) ────────────────────────────────────

export interface StageDefinition {
  stage: StageType;
  agent: AgentName;
  dependsOn: StageType[];
  /** Whether the stage may be skipped by a policy gate. */
  conditional: boolean;
}

// ── Agent Metadata & Status ────────────────────────────────────────

export interface AgentMetadata {
  agentName: AgentName;
  version: string;
  purpose: string;
  ready: boolean;
  stateless: true;
  deterministic: true;
  autonomous: false;
  model: ModelMetadata;
}

export interface RuntimeStatus {
  ready: boolean;
  policyVersion: string;
  executionOrder: AgentName[];
  grades: string[];
  agents: {
    anomaly: AgentMetadata;
    alloy: AgentMetadata;
  };
}

/** One reading of a batch: analyzed, or rejected before any stage ran. */
export type BatchItemResult<T> =
  | { index: number; status: "analyzed"; result: T }
  | { index: number; status: "rejected"; error: string; issues: string[] };
