/**
 * Spectrometer readings export (CSV) → analysis requests.
 *
 * Expected header: grade,Fe,C,Si,Mn,P,S with an optional sample_id column.
 * Rows are not validated here; the runtime validates each one and rejects
 * bad rows individually.
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ELEMENTS } from "../shared/types.js";

const CsvRowsSchema = z.array(z.record(z.string(), z.string().optional()));

export interface ReadingRow {
  sampleId: string;
  request: {
    grade: string;
    composition: Record<string, string>;
  };
}

export function parseReadingsCsv(text: string): ReadingRow[] {
  const parsed: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  const rows = CsvRowsSchema.parse(parsed);

  return rows.map((row, i) => {
    const composition: Record<string, string> = {};
    for (const el of ELEMENTS) {
      const value = row[el];
      if (value !== undefined) composition[el] = value;
    }
    return {
      sampleId: row.sample_id || `row-${i + 1}`,
      request: { grade: row.grade ?? "", composition },
    };
  });
}
