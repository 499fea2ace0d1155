/** Tracked elements, in the fixed order used by every model feature vector. */
export const ELEMENTS = ["Fe", "C", "Si", "Mn", "P", "S"] as const;

export type Element = (typeof ELEMENTS)[number];

/** Measured percentage per element (0–100 each; totals need not sum to 100). */
export type Composition = Readonly<Record<Element, number>>;

/** Partial per-element mapping, used for additions, deviations and in-spec flags. */
export type ElementMap<T> = Partial<Record<Element, T>>;

/** Inclusive [min, max] percentage range. */
export type ElementRange = readonly [number, number];

export interface GradeSpec {
  grade: string;
  description: string;
  compositionRanges: ElementMap<ElementRange>;
}

/** Anomaly severity tiers */
export type Severity = "LOW" | "MEDIUM" | "HIGH" | "ERROR";

/** Agent identifiers carried on every stage response */
export type AgentName = "AnomalyDetectionAgent" | "AlloyCorrectionAgent";

/** Pipeline stage identifiers (also used as audit decision labels) */
export type StageType = "ANOMALY_CHECK" | "ALLOY_RECOMMENDATION";

export interface AnomalyResult {
  agent: "AnomalyDetectionAgent";
  score: number; // 0 = normal, 1 = highly anomalous
  severity: Severity;
  confidence: number;
  explanation: string;
}

export interface CorrectionResult {
  agent: "AlloyCorrectionAgent";
  additions: ElementMap<number>;
  confidence: number;
  message: string;
  warning: string | null;
}

/** Result of validating a stage response before it is surfaced */
export interface ResponseValidation {
  valid: boolean;
  issues: string[];
}

export type CorrectionStatus = "success" | "skipped" | "failed";

/** Aggregated output of one analysis request */
export interface AnalysisResult {
  requestId: string;
  grade: string;
  anomaly: AnomalyResult;
  correction: CorrectionResult;
  correctionStatus: CorrectionStatus;
  validation: {
    anomaly: ResponseValidation;
    correction: ResponseValidation | null;
  };
  requiresHumanApproval: true;
  safetyNote: string;
  timestamp: string;
}

export interface AnalysisRequest {
  composition: Composition;
  grade: string;
}

export type DecisionOutcome = "success" | "failed" | "skipped";

/** Audit entry: one per stage outcome, hash-chained in append order. */
export interface DecisionRecord {
  entryId: string;
  requestId: string;
  decision: StageType;
  outcome: DecisionOutcome;
  reason: string;
  timestamp: string;
  position: number;
  contentHash: string;
  previousHash: string | null;
}
