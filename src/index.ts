export * from "./shared/types.js";
export * from "./shared/errors.js";
export {
  DEFAULT_CONFIG,
  PROJECT_ROOT,
  loadAdvisorConfig,
  type AdvisorConfig,
  type LoadConfigOptions,
} from "./shared/config.js";
export { GradeRegistry, loadGradeRegistry, saveGradeRegistry } from "./grades/registry.js";
export type { ModelMetadata, RegressionModel, ScoreCalibration, ScoringModel } from "./models/types.js";
export { ReferenceProfileScoringModel, UnavailableScoringModel } from "./models/reference_scoring.js";
export { LinearCorrectionModel, UnavailableRegressionModel } from "./models/linear_correction.js";
export { loadCorrectionModel, loadScoringModel } from "./models/loader.js";
export {
  AnomalyDetectionAgent,
  DEFAULT_SEVERITY_THRESHOLDS,
  type SeverityThresholds,
} from "./agents/anomaly_agent.js";
export {
  AlloyCorrectionAgent,
  DEFAULT_CORRECTION_LIMITS,
  type CorrectionLimits,
} from "./agents/alloy_agent.js";
export * from "./policy/decision_policy.js";
export { AgentRuntime } from "./agents/runtime.js";
export type {
  AgentMetadata,
  AnomalyOutcome,
  BatchItemResult,
  CorrectionOutcome,
  RuntimeStatus,
} from "./agents/types.js";
export {
  buildAdvisorContext,
  createAdvisorContext,
  type AdvisorContext,
  type ContextParts,
} from "./context.js";
export { AuditLog, validateDecisionChain } from "./trace/audit_log.js";
export { InMemoryAuditSink, JsonlFileAuditSink, type AuditSink } from "./trace/sinks.js";
export { exportJSONL, generateAuditSummaryMd, parseJSONL } from "./trace/exporters.js";
export { parseAnalysisRequest, parseComposition } from "./input/schemas.js";
export { parseReadingsCsv, type ReadingRow } from "./input/readings_csv.js";
