/**
 * Corpus loading
 *
 * Reads goal posts from a TSV/CSV export (post_id, post_title, username,
 * date_of_birth) or a JSON array. Rows without an id or with a blank
 * title are skipped and counted; repeated ids keep the first row.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { DreamRecord } from "@/types";

export class CorpusError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "CorpusError";
  }
}

export interface CorpusLoadResult {
  records: DreamRecord[];
  skipped: number;
}

const CellSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v).trim()));

const TableRowSchema = z.object({
  post_id: CellSchema,
  post_title: CellSchema,
  username: CellSchema,
  date_of_birth: CellSchema,
});

const JsonRowSchema = z.object({
  id: CellSchema,
  title: CellSchema,
  authorId: CellSchema,
  birthDate: CellSchema,
});

interface RawRow {
  id: string;
  title: string;
  authorId: string;
  birthDate: string;
}

export function loadCorpus(path: string): CorpusLoadResult {
  if (!existsSync(path)) {
    throw new CorpusError(`Corpus file not found: ${path}`, path);
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new CorpusError(`Failed to read corpus ${path}`, path, error);
  }

  const ext = extname(path).toLowerCase();
  const rows =
    ext === ".json"
      ? parseJsonCorpus(content, path)
      : parseTableCorpus(content, path, ext === ".csv" ? "," : "\t");
  return collectRecords(rows);
}

export function parseTableCorpus(
  content: string,
  path: string,
  delimiter: string,
): RawRow[] {
  try {
    const parsed: unknown = parse(content, {
      columns: true,
      delimiter,
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
    return z
      .array(TableRowSchema)
      .parse(parsed)
      .map((row) => ({
        id: row.post_id,
        title: row.post_title,
        authorId: row.username,
        birthDate: row.date_of_birth,
      }));
  } catch (error) {
    throw new CorpusError(`Failed to parse corpus ${path}`, path, error);
  }
}

export function parseJsonCorpus(content: string, path: string): RawRow[] {
  try {
    return z.array(JsonRowSchema).parse(JSON.parse(content));
  } catch (error) {
    throw new CorpusError(`Failed to parse corpus ${path}`, path, error);
  }
}

function collectRecords(rows: RawRow[]): CorpusLoadResult {
  const records: DreamRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const row of rows) {
    if (!row.id || !row.title || seen.has(row.id)) {
      skipped++;
      continue;
    }
    seen.add(row.id);
    records.push({
      id: row.id,
      rawTitle: row.title,
      authorId: row.authorId,
      birthDate: row.birthDate || undefined,
    });
  }

  return { records, skipped };
}
