import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { AgentRuntime } from "../src/agents/runtime.js";
import { buildAdvisorContext, createAdvisorContext, type ContextParts } from "../src/context.js";
import { loadGradeRegistry } from "../src/grades/registry.js";
import { loadCorrectionModel, loadScoringModel } from "../src/models/loader.js";
import type { ModelMetadata, RegressionModel, ScoringModel } from "../src/models/types.js";
import { DEFAULT_CONFIG, type AdvisorConfig } from "../src/shared/config.js";
import { InvalidCompositionError } from "../src/shared/errors.js";
import type { Composition } from "../src/shared/types.js";
import { InMemoryAuditSink } from "../src/trace/sinks.js";
import { CORRECTION_MESSAGES } from "../src/agents/alloy_agent.js";
import { AnomalyDetectionAgent } from "../src/agents/anomaly_agent.js";
import { validateDecisionChain } from "../src/trace/audit_log.js";
import { parseJSONL } from "../src/trace/exporters.js";

const CONFIG: AdvisorConfig = { ...DEFAULT_CONFIG, logDecisions: false };
const GREY_READING = { Fe: 93.5, C: 3.2, Si: 2.1, Mn: 0.65, P: 0.08, S: 0.12 };
const SG_READING = { Fe: 81.2, C: 4.4, Si: 3.1, Mn: 0.4, P: 0.04, S: 0.02 };
const SAFETY_NOTE = "Human approval required before action";

class ThrowingScoringModel implements ScoringModel {
  readonly calibration = { scoreMin: -2, scoreMax: 0 };
  isReady(): boolean {
    return true;
  }
  score(_composition: Composition): number {
    throw new Error("scorer crashed");
  }
  describe(): ModelMetadata {
    return { name: "ThrowingScoringModel", version: "test", ready: true, source: "test" };
  }
}

class ConstantScoringModel implements ScoringModel {
  readonly calibration = { scoreMin: -1, scoreMax: 0 };
  constructor(private readonly raw: number) {}
  isReady(): boolean {
    return true;
  }
  score(_composition: Composition): number {
    return this.raw;
  }
  describe(): ModelMetadata {
    return { name: "ConstantScoringModel", version: "test", ready: true, source: "test" };
  }
}

class ThrowingRegressionModel implements RegressionModel {
  readonly gradeIds = new Map([["SG-IRON", 0]]);
  isReady(): boolean {
    return true;
  }
  predict(_features: readonly number[]): number[] {
    throw new Error("regressor crashed");
  }
  describe(): ModelMetadata {
    return { name: "ThrowingRegressionModel", version: "test", ready: true, source: "test" };
  }
}

class OverconfidentAnomalyAgent extends AnomalyDetectionAgent {
  evaluate(composition: Composition) {
    return { ...super.evaluate(composition), confidence: 1.5 };
  }
}

function makeRuntime(overrides: Partial<ContextParts> = {}) {
  const sink = new InMemoryAuditSink();
  const context = buildAdvisorContext({
    config: CONFIG,
    grades: loadGradeRegistry(CONFIG.gradesPath),
    scoringModel: loadScoringModel(CONFIG.scoringModelPath),
    correctionModel: loadCorrectionModel(CONFIG.correctionModelPath),
    auditSinks: [sink],
    ...overrides,
  });
  return { runtime: new AgentRuntime(context), context, sink };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("AgentRuntime.analyze", () => {
  it("skips correction for a LOW-severity GREY-IRON reading", () => {
    const { runtime, sink } = makeRuntime();
    const result = runtime.analyze({ composition: GREY_READING, grade: "GREY-IRON" });

    expect(result.grade).toBe("GREY-IRON");
    expect(result.anomaly.severity).toBe("LOW");
    expect(result.anomaly.score).toBeCloseTo(0.2519976471983953, 10);
    expect(result.correctionStatus).toBe("skipped");
    expect(result.correction.message).toBe(
      "Not invoked - anomaly severity below threshold (must be MEDIUM or HIGH)",
    );
    expect(result.correction.additions).toEqual({});
    expect(result.validation).toEqual({ anomaly: { valid: true, issues: [] }, correction: null });

    const records = sink.forRequest(result.requestId);
    expect(records.map((r) => [r.decision, r.outcome])).toEqual([
      ["ANOMALY_CHECK", "success"],
      ["ALLOY_RECOMMENDATION", "skipped"],
    ]);
    expect(records[0].reason).toBe("Severity: LOW, Score: 0.252");
    expect(records[1].reason).toBe("Anomaly severity LOW; correction requires MEDIUM or HIGH");
  });

  it("recommends additions for a MEDIUM-severity SG-IRON reading", () => {
    const { runtime, sink } = makeRuntime();
    const result = runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });

    expect(result.anomaly.severity).toBe("MEDIUM");
    expect(result.correctionStatus).toBe("success");
    expect(result.correction.additions).toEqual({ Fe: 4.8, Mn: 0.25 });
    expect(result.correction.confidence).toBeCloseTo(0.29735, 10);
    expect(result.correction.message).toBe(CORRECTION_MESSAGES.low);
    expect(result.correction.warning).toBe(
      "Large total addition required (>3%). Consider re-melting or blending.",
    );
    expect(result.validation.correction).toEqual({ valid: true, issues: [] });

    const records = sink.forRequest(result.requestId);
    expect(records.map((r) => r.outcome)).toEqual(["success", "success"]);
    expect(records[1].reason).toBe("Grade SG-IRON: 2 additions, confidence 0.297");
  });

  it("always attaches the safety note and approval flag", () => {
    const { runtime } = makeRuntime();
    for (const input of [
      { composition: GREY_READING, grade: "GREY-IRON" },
      { composition: SG_READING, grade: "SG-IRON" },
      { composition: SG_READING, grade: "UNOBTAINIUM" },
    ]) {
      const result = runtime.analyze(input);
      expect(result.safetyNote).toBe(SAFETY_NOTE);
      expect(result.requiresHumanApproval).toBe(true);
    }
  });

  it("answers an unknown grade without failing the request", () => {
    const { runtime } = makeRuntime();
    const result = runtime.analyze({ composition: SG_READING, grade: "UNOBTAINIUM" });
    expect(result.correctionStatus).toBe("success");
    expect(result.correction.additions).toEqual({});
    expect(result.correction.warning).toBe("Grade not in training data: UNOBTAINIUM");
  });

  it("rejects invalid input before any stage runs", () => {
    const { runtime, sink } = makeRuntime();
    expect(() => runtime.analyze({ composition: { ...SG_READING, Fe: 140 }, grade: "SG-IRON" })).toThrow(
      InvalidCompositionError,
    );
    expect(sink.records).toHaveLength(0);
  });

  it("isolates an anomaly stage failure", () => {
    const { runtime, sink } = makeRuntime({ scoringModel: new ThrowingScoringModel() });
    const result = runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });

    expect(result.anomaly.severity).toBe("ERROR");
    expect(result.anomaly.explanation).toBe(
      "Anomaly evaluation failed: AnomalyDetectionAgent inference failed: scorer crashed",
    );
    expect(result.correctionStatus).toBe("skipped");
    expect(result.safetyNote).toBe(SAFETY_NOTE);
    expect(sink.forRequest(result.requestId).map((r) => r.outcome)).toEqual([
      "failed",
      "skipped",
    ]);
  });

  it("isolates a correction stage failure", () => {
    const { runtime, sink } = makeRuntime({
      scoringModel: new ConstantScoringModel(-0.9),
      correctionModel: new ThrowingRegressionModel(),
    });
    const result = runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });

    expect(result.anomaly.severity).toBe("HIGH");
    expect(result.correctionStatus).toBe("failed");
    expect(result.correction).toEqual({
      agent: "AlloyCorrectionAgent",
      additions: {},
      confidence: 0,
      message: "Alloy recommendation failed: AlloyCorrectionAgent inference failed: regressor crashed",
      warning: "No recommendation available. Manual review required.",
    });
    expect(sink.forRequest(result.requestId).map((r) => r.outcome)).toEqual([
      "success",
      "failed",
    ]);
  });

  it("reports not-ready models as stage failures", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { runtime } = makeRuntime({
      scoringModel: loadScoringModel("/nonexistent/scoring_model.json"),
    });
    const result = runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });
    expect(result.anomaly.explanation).toBe(
      "Anomaly evaluation failed: AnomalyDetectionAgent is not ready",
    );
  });

  it("keeps a valid hash chain across requests", () => {
    const { runtime, context, sink } = makeRuntime();
    runtime.analyze({ composition: GREY_READING, grade: "GREY-IRON" });
    runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });
    expect(context.audit.size).toBe(4);
    expect(sink.validateChain().valid).toBe(true);
    expect(sink.records).toHaveLength(4);
    expect(context.audit.last()).toBe(sink.records[3]);
  });

  it("passes an invalid stage response through, tagged and logged", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { runtime } = makeRuntime({
      anomalyAgent: new OverconfidentAnomalyAgent(loadScoringModel(CONFIG.scoringModelPath)),
    });
    const result = runtime.analyze({ composition: SG_READING, grade: "SG-IRON" });

    expect(result.anomaly.confidence).toBe(1.5);
    expect(result.anomaly.severity).toBe("MEDIUM");
    expect(result.validation.anomaly).toEqual({
      valid: false,
      issues: ["confidence: Number must be less than or equal to 1"],
    });
    expect(result.validation.correction).toEqual({ valid: true, issues: [] });
    expect(warn).toHaveBeenCalledWith(
      "[AgentRuntime] Invalid AnomalyDetectionAgent response: confidence: Number must be less than or equal to 1",
    );
  });

  it("logs decisions when enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { runtime } = makeRuntime({ config: { ...CONFIG, logDecisions: true } });
    runtime.analyze({ composition: GREY_READING, grade: "GREY-IRON" });
    expect(log).toHaveBeenCalledWith("[DecisionPolicy] ANOMALY_CHECK - Reason: Severity: LOW, Score: 0.252");
  });
});

describe("AgentRuntime single-stage operations", () => {
  it("evaluateAnomaly audits one record", () => {
    const { runtime, sink } = makeRuntime();
    const result = runtime.evaluateAnomaly(SG_READING);
    expect(result.severity).toBe("MEDIUM");
    expect(sink.getChain().map((r) => r.decision)).toEqual(["ANOMALY_CHECK"]);
  });

  it("recommendCorrection runs without the severity gate", () => {
    const { runtime, sink } = makeRuntime();
    const result = runtime.recommendCorrection("GREY-IRON", GREY_READING);
    expect(result.additions).toEqual({ Mn: 0.15 });
    expect(result.confidence).toBeCloseTo(0.76985, 10);
    expect(result.message).toBe(CORRECTION_MESSAGES.moderate);
    expect(result.warning).toBeNull();
    expect(sink.getChain().map((r) => r.decision)).toEqual(["ALLOY_RECOMMENDATION"]);
  });

  it("validates single-stage input", () => {
    const { runtime } = makeRuntime();
    expect(() => runtime.evaluateAnomaly({ Fe: 1 })).toThrow(InvalidCompositionError);
    expect(() => runtime.recommendCorrection("", SG_READING)).toThrow(InvalidCompositionError);
  });
});

describe("AgentRuntime.analyzeBatch", () => {
  it("rejects invalid readings individually", () => {
    const { runtime } = makeRuntime();
    const results = runtime.analyzeBatch([
      { composition: GREY_READING, grade: "GREY-IRON" },
      { composition: { ...SG_READING, C: "n/a" }, grade: "SG-IRON" },
      { composition: SG_READING, grade: "SG-IRON" },
    ]);

    expect(results.map((r) => r.status)).toEqual(["analyzed", "rejected", "analyzed"]);
    const rejected = results[1];
    if (rejected.status !== "rejected") throw new Error("expected a rejection");
    expect(rejected.index).toBe(1);
    expect(rejected.issues).toHaveLength(1);
    expect(rejected.issues[0]).toMatch(/^composition\.C: /);
  });
});

describe("AgentRuntime status", () => {
  it("reports readiness, order and agent metadata", () => {
    const { runtime } = makeRuntime();
    const status = runtime.getStatus();
    expect(runtime.isReady()).toBe(true);
    expect(status.ready).toBe(true);
    expect(status.policyVersion).toBe("1.0.0");
    expect(status.executionOrder).toEqual(["AnomalyDetectionAgent", "AlloyCorrectionAgent"]);
    expect(status.grades).toHaveLength(5);
    expect(status.agents.anomaly).toMatchObject({
      agentName: "AnomalyDetectionAgent",
      version: "1.0.0",
      autonomous: false,
      model: { name: "ReferenceProfileScoringModel", ready: true },
    });
    expect(status.agents.alloy.model).toMatchObject({ name: "LinearCorrectionModel", detail: "5 trained grades" });
  });

  it("is not ready when an artifact is missing", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { runtime } = makeRuntime({
      correctionModel: loadCorrectionModel("/nonexistent/correction_model.json"),
    });
    expect(runtime.isReady()).toBe(false);
    expect(runtime.getStatus().agents.alloy.ready).toBe(false);
  });
});

describe("createAdvisorContext", () => {
  it("loads the shipped artifacts", () => {
    const context = createAdvisorContext(CONFIG);
    expect(context.grades.listGrades()).toHaveLength(5);
    expect(context.anomalyAgent.isReady()).toBe(true);
    expect(context.alloyAgent.isReady()).toBe(true);
    expect(context.audit.size).toBe(0);
  });
});

describe("Persisted audit trail", () => {
  it("continues the hash chain across contexts sharing one audit file", async () => {
    const dir = mkdtempSync(path.join(tmpdir(), "advisor-audit-"));
    try {
      const file = path.join(dir, "audit.jsonl");
      const config: AdvisorConfig = { ...CONFIG, auditLogPath: file };

      const first = createAdvisorContext(config);
      new AgentRuntime(first).analyze({ composition: SG_READING, grade: "SG-IRON" });
      await first.audit.flush();

      const second = createAdvisorContext(config);
      expect(second.audit.last()?.position).toBe(1);
      new AgentRuntime(second).analyze({ composition: SG_READING, grade: "SG-IRON" });
      await second.audit.flush();

      const persisted = parseJSONL(readFileSync(file, "utf-8"));
      expect(persisted.map((r) => r.position)).toEqual([0, 1, 2, 3]);
      expect(persisted[2].previousHash).toBe(persisted[1].contentHash);
      expect(validateDecisionChain(persisted)).toEqual({ valid: true, errors: [] });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
