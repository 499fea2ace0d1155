/**
 * Linear correction model — one affine block per trained grade.
 *
 * predict([gradeId, ...composition]) = intercept + coefficients · composition
 */

import { ELEMENTS } from "../shared/types.js";
import { ModelInferenceError, ModelNotReadyError } from "../shared/errors.js";
import type { CorrectionArtifact, CorrectionBlock } from "./artifacts.js";
import type { ModelMetadata, RegressionModel } from "./types.js";

const MODEL_NAME = "LinearCorrectionModel";

export class LinearCorrectionModel implements RegressionModel {
  readonly gradeIds: ReadonlyMap<string, number>;
  private readonly blocks: ReadonlyMap<number, CorrectionBlock>;
  private readonly version: string;
  private readonly source: string;

  constructor(artifact: CorrectionArtifact, source = "in-memory") {
    this.gradeIds = new Map(Object.entries(artifact.grades));
    this.blocks = new Map(artifact.blocks.map((b) => [b.grade_id, b]));
    this.version = artifact.version;
    this.source = source;
  }

  isReady(): boolean {
    return true;
  }

  predict(features: readonly number[]): number[] {
    if (features.length !== ELEMENTS.length + 1) {
      throw new ModelInferenceError(
        MODEL_NAME,
        `expected ${ELEMENTS.length + 1} features, got ${features.length}`,
      );
    }
    const [gradeId, ...values] = features;
    const block = this.blocks.get(gradeId);
    if (!block) {
      throw new ModelInferenceError(MODEL_NAME, `no coefficients for grade id ${gradeId}`);
    }

    return block.intercept.map((b, i) => {
      let out = b;
      const row = block.coefficients[i];
      for (let j = 0; j < values.length; j++) {
        out += row[j] * values[j];
      }
      return out;
    });
  }

  describe(): ModelMetadata {
    return {
      name: MODEL_NAME,
      version: this.version,
      ready: true,
      source: this.source,
      detail: `${this.gradeIds.size} trained grades`,
    };
  }
}

/**
 * Placeholder used when no correction artifact could be loaded.
 */
export class UnavailableRegressionModel implements RegressionModel {
  readonly gradeIds: ReadonlyMap<string, number> = new Map();

  constructor(
    private readonly source: string,
    private readonly reason: string,
  ) {}

  isReady(): boolean {
    return false;
  }

  predict(): number[] {
    throw new ModelNotReadyError(MODEL_NAME);
  }

  describe(): ModelMetadata {
    return { name: MODEL_NAME, version: "none", ready: false, source: this.source, detail: this.reason };
  }
}
