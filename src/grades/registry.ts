/**
 * Grade Registry — read-only table of metal grades and their element ranges.
 *
 * Built once (from data/grades.json by default) and shared by every request.
 * All lookups are pure; reloading means constructing a new registry.
 */

import { readFileSync, writeFileSync } from "fs";
import { ELEMENTS } from "../shared/types.js";
import type { ElementMap, GradeSpec } from "../shared/types.js";
import { ArtifactError, UnknownGradeError, describeError } from "../shared/errors.js";
import { GradeTableSchema, toGradeSpec, toGradeSpecRecord } from "./schema.js";
import type { GradeTable } from "./schema.js";

export class GradeRegistry {
  private readonly specs: ReadonlyMap<string, GradeSpec>;

  constructor(specs: Iterable<GradeSpec>) {
    const map = new Map<string, GradeSpec>();
    for (const spec of specs) {
      for (const el of ELEMENTS) {
        const range = spec.compositionRanges[el];
        if (range && range[0] > range[1]) {
          throw new ArtifactError(spec.grade, [`${el}: min ${range[0]} exceeds max ${range[1]}`]);
        }
      }
      map.set(spec.grade, deepFreeze(structuredClone(spec)));
    }
    this.specs = map;
  }

  /** Parse a persisted grade table. */
  static fromJson(text: string, source = "grade table"): GradeRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ArtifactError(source, [describeError(err)]);
    }
    const parsed = GradeTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ArtifactError(
        source,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    return new GradeRegistry(Object.values(parsed.data).map(toGradeSpec));
  }

  hasGrade(grade: string): boolean {
    return this.specs.has(grade);
  }

  listGrades(): string[] {
    return [...this.specs.keys()];
  }

  getAllSpecs(): GradeSpec[] {
    return [...this.specs.values()];
  }

  getSpec(grade: string): GradeSpec {
    const spec = this.specs.get(grade);
    if (!spec) throw new UnknownGradeError(grade, this.listGrades());
    return spec;
  }

  /** (min + max) / 2 per element of the grade. */
  getMidpoint(grade: string): ElementMap<number> {
    const spec = this.getSpec(grade);
    const midpoints: ElementMap<number> = {};
    for (const el of ELEMENTS) {
      const range = spec.compositionRanges[el];
      if (range) midpoints[el] = (range[0] + range[1]) / 2;
    }
    return midpoints;
  }

  /**
   * Inclusive range membership per element.
   * Elements the grade does not specify are left out rather than reported.
   */
  isInSpec(grade: string, composition: ElementMap<number>): ElementMap<boolean> {
    const spec = this.getSpec(grade);
    const inSpec: ElementMap<boolean> = {};
    for (const el of ELEMENTS) {
      const range = spec.compositionRanges[el];
      const value = composition[el];
      if (!range || value === undefined) continue;
      inSpec[el] = range[0] <= value && value <= range[1];
    }
    return inSpec;
  }

  /** Signed distance of each measured element from the grade midpoint. */
  getDeviation(grade: string, composition: ElementMap<number>): ElementMap<number> {
    const midpoints = this.getMidpoint(grade);
    const deviations: ElementMap<number> = {};
    for (const el of ELEMENTS) {
      const mid = midpoints[el];
      const value = composition[el];
      if (mid === undefined || value === undefined) continue;
      deviations[el] = value - mid;
    }
    return deviations;
  }

  toTable(): GradeTable {
    const table: GradeTable = {};
    for (const spec of this.specs.values()) {
      table[spec.grade] = toGradeSpecRecord(spec);
    }
    return table;
  }
}

export function loadGradeRegistry(filePath: string): GradeRegistry {
  return GradeRegistry.fromJson(readFileSync(filePath, "utf-8"), filePath);
}

export function saveGradeRegistry(registry: GradeRegistry, filePath: string): void {
  writeFileSync(filePath, JSON.stringify(registry.toTable(), null, 2) + "\n", "utf-8");
}

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}
