import { z } from "zod";
import type { DecisionRecord } from "../shared/types.js";
import { describeError } from "../shared/errors.js";

/**
 * Export decision records as JSONL string (one JSON line per record).
 */
export function exportJSONL(chain: readonly DecisionRecord[]): string {
  return chain.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

const DecisionRecordSchema = z.object({
  entryId: z.string(),
  requestId: z.string(),
  decision: z.enum(["ANOMALY_CHECK", "ALLOY_RECOMMENDATION"]),
  outcome: z.enum(["success", "failed", "skipped"]),
  reason: z.string(),
  timestamp: z.string(),
  position: z.number().int().nonnegative(),
  contentHash: z.string(),
  previousHash: z.string().nullable(),
});

/**
 * Read records back from a JSONL audit file. Blank lines are ignored; errors
 * name the 1-based line they occur on.
 */
export function parseJSONL(text: string): DecisionRecord[] {
  const records: DecisionRecord[] = [];
  text.split("\n").forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new Error(`Audit line ${i + 1}: ${describeError(err)}`);
    }
    const parsed = DecisionRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Audit line ${i + 1}: ${parsed.error.issues.map((x) => x.message).join("; ")}`);
    }
    records.push(parsed.data);
  });
  return records;
}

/**
 * Generate a markdown audit summary from the decision chain.
 */
export function generateAuditSummaryMd(chain: readonly DecisionRecord[], title: string): string {
  const lines: string[] = [
    `# Audit Summary — ${title}`,
    "",
    `## Decision Records (${chain.length})`,
    "",
    "| # | Decision | Outcome | Request | Reason | Content Hash |",
    "|---|----------|---------|---------|--------|--------------|",
  ];

  for (const record of chain) {
    lines.push(
      `| ${record.position} | ${record.decision} | ${record.outcome} | ${record.requestId.slice(0, 8)} | ${record.reason.replace(/\|/g, "\\|")} | ${record.contentHash.slice(0, 16)}... |`,
    );
  }

  const counts = { success: 0, failed: 0, skipped: 0 };
  for (const record of chain) counts[record.outcome]++;

  lines.push("");
  lines.push("## Outcomes");
  lines.push("");
  lines.push(`- **Success**: ${counts.success}`);
  lines.push(`- **Failed**: ${counts.failed}`);
  lines.push(`- **Skipped**: ${counts.skipped}`);

  const last = chain[chain.length - 1];
  if (last) {
    lines.push("");
    lines.push("## Hash Chain");
    lines.push("");
    lines.push(`- **Final Content Hash**: \`${last.contentHash}\``);
    lines.push(`- **Chain Length**: ${chain.length}`);
  }

  return lines.join("\n");
}
