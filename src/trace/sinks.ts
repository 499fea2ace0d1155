/**
 * Audit sinks — where decision records go once appended.
 */

import { existsSync, readFileSync } from "fs";
import { appendFile, mkdir } from "fs/promises";
import path from "path";
import type { DecisionRecord } from "../shared/types.js";
import { ArtifactError, describeError } from "../shared/errors.js";
import { validateDecisionChain } from "./audit_log.js";
import { exportJSONL, parseJSONL } from "./exporters.js";

export interface AuditSink {
  /** Accept a record; must not block or throw. */
  write(record: DecisionRecord): void;
  /** Resolve once every accepted record is persisted. */
  flush(): Promise<void>;
  /** Last record already held by the sink, for the log to chain onto. */
  resumeFrom?(): DecisionRecord | null;
}

/**
 * Keeps every record it receives. Opt-in retention for tests and callers that
 * want to inspect the chain in process.
 */
export class InMemoryAuditSink implements AuditSink {
  readonly records: DecisionRecord[] = [];

  write(record: DecisionRecord): void {
    this.records.push(record);
  }

  async flush(): Promise<void> {
    // nothing buffered
  }

  getChain(): DecisionRecord[] {
    return [...this.records];
  }

  /** Records belonging to one request, in append order. */
  forRequest(requestId: string): DecisionRecord[] {
    return this.records.filter((r) => r.requestId === requestId);
  }

  validateChain(): { valid: boolean; errors: string[] } {
    return validateDecisionChain(this.records);
  }
}

/**
 * Appends one JSON line per record. Writes go through a single promise
 * chain, so lines land in the order records were appended.
 *
 * An existing file is read once at construction; its last record is the
 * point the audit log resumes from. A file whose chain does not validate
 * is refused rather than extended.
 */
export class JsonlFileAuditSink implements AuditSink {
  private queue: Promise<void>;
  private failure: Error | null = null;
  private readonly existingTail: DecisionRecord | null;

  constructor(private readonly filePath: string) {
    this.existingTail = readTail(filePath);
    this.queue = mkdir(path.dirname(filePath), { recursive: true }).then(
      () => undefined,
      (err: unknown) => this.recordFailure(err),
    );
  }

  resumeFrom(): DecisionRecord | null {
    return this.existingTail;
  }

  write(record: DecisionRecord): void {
    this.queue = this.queue
      .then(() => appendFile(this.filePath, exportJSONL([record]), "utf-8"))
      .catch((err: unknown) => this.recordFailure(err));
  }

  private recordFailure(err: unknown): void {
    this.failure = err instanceof Error ? err : new Error(describeError(err));
    console.error(`[audit] Failed to append to ${this.filePath}: ${this.failure.message}`);
  }

  async flush(): Promise<void> {
    await this.queue;
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }
}

function readTail(filePath: string): DecisionRecord | null {
  if (!existsSync(filePath)) return null;
  const chain = parseJSONL(readFileSync(filePath, "utf-8"));
  const check = validateDecisionChain(chain);
  if (!check.valid) {
    throw new ArtifactError(filePath, check.errors);
  }
  return chain[chain.length - 1] ?? null;
}
