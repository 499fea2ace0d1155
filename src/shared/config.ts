/**
 * Advisor Configuration
 *
 * Thresholds, safety caps and artifact locations. Values come from the
 * environment, optionally layered over a .env file; environment wins.
 * Defaults reproduce the values the models were calibrated against.
 */

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Repository root (works from both src/ and the compiled dist/). */
export const PROJECT_ROOT = path.resolve(__dirname, "..", "..");

export interface AdvisorConfig {
  gradesPath: string;
  scoringModelPath: string;
  correctionModelPath: string;
  /** JSONL audit file; in-memory only when undefined. */
  auditLogPath?: string;
  severityThresholds: { medium: number; high: number };
  maxAdditionPercentage: number;
  significanceFloor: number;
  minConfidenceThreshold: number;
  logDecisions: boolean;
}

export const DEFAULT_CONFIG: AdvisorConfig = {
  gradesPath: path.join(PROJECT_ROOT, "data", "grades.json"),
  scoringModelPath: path.join(PROJECT_ROOT, "models", "scoring_model.json"),
  correctionModelPath: path.join(PROJECT_ROOT, "models", "correction_model.json"),
  severityThresholds: { medium: 0.33, high: 0.66 },
  maxAdditionPercentage: 5.0,
  significanceFloor: 0.01,
  minConfidenceThreshold: 0.5,
  logDecisions: true,
};

const booleanFlag = z.preprocess(
  (v) => (typeof v === "string" ? ["true", "1", "yes", "on"].includes(v.trim().toLowerCase()) : v),
  z.boolean(),
);

const unitInterval = z.coerce.number().min(0).max(1);

const EnvSchema = z
  .object({
    ADVISOR_GRADES_PATH: z.string().min(1).optional(),
    ADVISOR_SCORING_MODEL_PATH: z.string().min(1).optional(),
    ADVISOR_CORRECTION_MODEL_PATH: z.string().min(1).optional(),
    ADVISOR_AUDIT_LOG_PATH: z.string().min(1).optional(),
    ADVISOR_SEVERITY_MEDIUM: unitInterval.optional(),
    ADVISOR_SEVERITY_HIGH: unitInterval.optional(),
    ADVISOR_MAX_ADDITION: z.coerce.number().positive().max(100).optional(),
    ADVISOR_SIGNIFICANCE_FLOOR: z.coerce.number().nonnegative().optional(),
    ADVISOR_MIN_CONFIDENCE: unitInterval.optional(),
    ADVISOR_LOG_DECISIONS: booleanFlag.optional(),
  })
  .superRefine((env, ctx) => {
    const medium = env.ADVISOR_SEVERITY_MEDIUM ?? DEFAULT_CONFIG.severityThresholds.medium;
    const high = env.ADVISOR_SEVERITY_HIGH ?? DEFAULT_CONFIG.severityThresholds.high;
    if (medium >= high) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ADVISOR_SEVERITY_MEDIUM"],
        message: `must be below ADVISOR_SEVERITY_HIGH (${medium} >= ${high})`,
      });
    }
  });

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Optional .env file whose values apply where `env` has none. */
  dotenvPath?: string;
}

/**
 * Resolve the advisor configuration.
 * Relative paths are resolved against the project root.
 */
export function loadAdvisorConfig(options: LoadConfigOptions = {}): AdvisorConfig {
  const fileValues = options.dotenvPath ? parseDotenv(readFileSync(options.dotenvPath)) : {};
  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const [key, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined && value !== "") merged[key] = value;
  }

  const parsed = EnvSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const env = parsed.data;

  return {
    gradesPath: resolvePath(env.ADVISOR_GRADES_PATH) ?? DEFAULT_CONFIG.gradesPath,
    scoringModelPath: resolvePath(env.ADVISOR_SCORING_MODEL_PATH) ?? DEFAULT_CONFIG.scoringModelPath,
    correctionModelPath:
      resolvePath(env.ADVISOR_CORRECTION_MODEL_PATH) ?? DEFAULT_CONFIG.correctionModelPath,
    auditLogPath: resolvePath(env.ADVISOR_AUDIT_LOG_PATH),
    severityThresholds: {
      medium: env.ADVISOR_SEVERITY_MEDIUM ?? DEFAULT_CONFIG.severityThresholds.medium,
      high: env.ADVISOR_SEVERITY_HIGH ?? DEFAULT_CONFIG.severityThresholds.high,
    },
    maxAdditionPercentage: env.ADVISOR_MAX_ADDITION ?? DEFAULT_CONFIG.maxAdditionPercentage,
    significanceFloor: env.ADVISOR_SIGNIFICANCE_FLOOR ?? DEFAULT_CONFIG.significanceFloor,
    minConfidenceThreshold: env.ADVISOR_MIN_CONFIDENCE ?? DEFAULT_CONFIG.minConfidenceThreshold,
    logDecisions: env.ADVISOR_LOG_DECISIONS ?? DEFAULT_CONFIG.logDecisions,
  };
}

function resolvePath(p: string | undefined): string | undefined {
  if (p === undefined) return undefined;
  return path.isAbsolute(p) ? p : path.resolve(PROJECT_ROOT, p);
}
