import { v4 as uuidv4 } from "uuid";
import { contentHash } from "../shared/hash.js";
import type { DecisionOutcome, DecisionRecord, StageType } from "../shared/types.js";
import type { AuditSink } from "./sinks.js";

/**
 * Audit Log: append-only, hash-chained decision records shared by all requests.
 *
 * Only the tail of the chain is held here; retention is the sinks' job. A sink
 * that already holds records (e.g. an existing JSONL file) supplies the tail
 * to continue from, so the chain stays unbroken across restarts.
 *
 * `append` is synchronous, so records from concurrent requests are ordered by
 * the event loop and never interleave. Sinks receive each record once, in
 * chain order.
 */
export class AuditLog {
  private tail: DecisionRecord | null;
  private appended = 0;

  constructor(private readonly sinks: AuditSink[] = []) {
    this.tail = resumePoint(sinks);
  }

  /**
   * Record a stage outcome. Automatically chains hashes.
   */
  append(params: {
    requestId: string;
    decision: StageType;
    outcome: DecisionOutcome;
    reason: string;
    at?: Date;
  }): DecisionRecord {
    const position = this.tail ? this.tail.position + 1 : 0;
    const previousHash = this.tail ? this.tail.contentHash : null;

    // Build record without hash fields first
    const recordContent = {
      entryId: uuidv4(),
      requestId: params.requestId,
      decision: params.decision,
      outcome: params.outcome,
      reason: params.reason,
      timestamp: (params.at ?? new Date()).toISOString(),
      position,
      previousHash,
    };

    const record: DecisionRecord = Object.freeze({
      ...recordContent,
      contentHash: contentHash(recordContent),
    });

    this.tail = record;
    this.appended++;
    for (const sink of this.sinks) {
      sink.write(record);
    }
    return record;
  }

  /** Most recent record, including one resumed from a sink. */
  last(): DecisionRecord | null {
    return this.tail;
  }

  /** Records appended through this instance. */
  get size(): number {
    return this.appended;
  }

  /** Wait for every sink to persist what it has been given. */
  async flush(): Promise<void> {
    await Promise.all(this.sinks.map((s) => s.flush()));
  }
}

function resumePoint(sinks: readonly AuditSink[]): DecisionRecord | null {
  let tail: DecisionRecord | null = null;
  for (const sink of sinks) {
    const candidate = sink.resumeFrom?.() ?? null;
    if (candidate && (!tail || candidate.position > tail.position)) tail = candidate;
  }
  return tail;
}

/**
 * Check positions, previous-hash links and content hashes of a record chain,
 * e.g. one read back from a JSONL audit file.
 */
export function validateDecisionChain(chain: readonly DecisionRecord[]): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];

    if (record.position !== i) {
      errors.push(`Record ${i}: position mismatch (expected ${i}, got ${record.position})`);
    }

    if (i === 0 && record.previousHash !== null) {
      errors.push(`Record 0: previous hash should be null`);
    }
    if (i > 0 && record.previousHash !== chain[i - 1].contentHash) {
      errors.push(`Record ${i}: previous hash does not match prior record content hash`);
    }

    const { contentHash: storedHash, ...contentWithoutHash } = record;
    if (storedHash !== contentHash(contentWithoutHash)) {
      errors.push(`Record ${i}: content hash mismatch`);
    }
  }

  return { valid: errors.length === 0, errors };
}
