/**
 * CSV interaction files: one row per interaction with a header line
 * (user_id,item_id[,timestamp]). Extra columns are ignored.
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { InMemoryInteractionStore } from "@/lib/db/memory";
import { toInteractionRecord } from "@/lib/db/records";
import type { InteractionRecord } from "@/lib/recs/types";
import { logger } from "@/lib/util/logger";

export function parseInteractionsCsv(content: string): InteractionRecord[] {
  const rows: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  return rows.map((row) => toInteractionRecord(row));
}

export async function readInteractionsCsv(path: string): Promise<InteractionRecord[]> {
  const content = await readFile(path, "utf-8");
  const records = parseInteractionsCsv(content);
  logger.info("Loaded interactions from CSV", { path, records: records.length });
  return records;
}

export async function loadCsvStore(path: string): Promise<InMemoryInteractionStore> {
  return new InMemoryInteractionStore(await readInteractionsCsv(path));
}
