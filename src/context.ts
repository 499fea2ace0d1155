/**
 * AdvisorContext — everything a request needs, built once and passed in.
 *
 * The grade registry and model handles are read-only after construction; the
 * audit log is the only mutable member.
 */

import { loadAdvisorConfig, type AdvisorConfig } from "./shared/config.js";
import { GradeRegistry, loadGradeRegistry } from "./grades/registry.js";
import { loadCorrectionModel, loadScoringModel } from "./models/loader.js";
import type { RegressionModel, ScoringModel } from "./models/types.js";
import { AnomalyDetectionAgent } from "./agents/anomaly_agent.js";
import { AlloyCorrectionAgent } from "./agents/alloy_agent.js";
import { AuditLog } from "./trace/audit_log.js";
import { JsonlFileAuditSink, type AuditSink } from "./trace/sinks.js";

export interface AdvisorContext {
  readonly config: AdvisorConfig;
  readonly grades: GradeRegistry;
  readonly anomalyAgent: AnomalyDetectionAgent;
  readonly alloyAgent: AlloyCorrectionAgent;
  readonly audit: AuditLog;
}

export interface ContextParts {
  config: AdvisorConfig;
  grades: GradeRegistry;
  scoringModel: ScoringModel;
  correctionModel: RegressionModel;
  /** Defaults to a JSONL file sink when `config.auditLogPath` is set. */
  auditSinks?: AuditSink[];
  /** Prebuilt agents; when given, the matching model is not wrapped. */
  anomalyAgent?: AnomalyDetectionAgent;
  alloyAgent?: AlloyCorrectionAgent;
}

/**
 * Assemble a context from already-built parts (tests inject fakes here).
 */
export function buildAdvisorContext(parts: ContextParts): AdvisorContext {
  const { config } = parts;
  const sinks =
    parts.auditSinks ?? (config.auditLogPath ? [new JsonlFileAuditSink(config.auditLogPath)] : []);

  return Object.freeze({
    config,
    grades: parts.grades,
    anomalyAgent:
      parts.anomalyAgent ?? new AnomalyDetectionAgent(parts.scoringModel, config.severityThresholds),
    alloyAgent:
      parts.alloyAgent ??
      new AlloyCorrectionAgent(parts.correctionModel, parts.grades, {
        maxAdditionPercentage: config.maxAdditionPercentage,
        significanceFloor: config.significanceFloor,
        minConfidenceThreshold: config.minConfidenceThreshold,
      }),
    audit: new AuditLog(sinks),
  });
}

/**
 * Load the grade table and both model artifacts named by the configuration.
 * A missing model artifact leaves that agent not ready; a missing grade table
 * or a malformed artifact throws.
 */
export function createAdvisorContext(config: AdvisorConfig = loadAdvisorConfig()): AdvisorContext {
  const grades = loadGradeRegistry(config.gradesPath);
  const context = buildAdvisorContext({
    config,
    grades,
    scoringModel: loadScoringModel(config.scoringModelPath),
    correctionModel: loadCorrectionModel(config.correctionModelPath),
  });

  if (config.logDecisions) {
    console.log(
      `[advisor] Loaded ${grades.listGrades().length} grades; ` +
        `anomaly ready: ${context.anomalyAgent.isReady()}, ` +
        `alloy ready: ${context.alloyAgent.isReady()}`,
    );
  }
  return context;
}
