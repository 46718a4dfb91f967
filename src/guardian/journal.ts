import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import { z } from "zod";
import type { PrefixPaths } from "../core/paths.js";
import type { TransactionRecord } from "../core/types.js";

const TransactionRecordSchema = z.object({
  name: z.string(),
  restore: z.boolean(),
  status: z.enum(["captured", "restored", "aborted"]),
  phases: z.array(z.enum(["running", "quiescing", "captured", "restoring"])),
  startedAt: z.string(),
  finishedAt: z.string(),
  error: z.string().nullable(),
  undoFailures: z.array(z.string())
});

export async function writeTransactionRecord(paths: PrefixPaths, record: TransactionRecord): Promise<string> {
  await fs.mkdir(paths.transactions, { recursive: true });
  const digest = createHash("sha256")
    .update(JSON.stringify(record))
    .digest("hex")
    .slice(0, 12);
  const filePath = path.join(paths.transactions, `${Date.now()}-${encodeURIComponent(record.name)}-${digest}.json`);
  await fs.writeFile(filePath, JSON.stringify(record, null, 2), "utf8");
  return filePath;
}

function parseRecord(raw: string): TransactionRecord | null {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = TransactionRecordSchema.safeParse(document);
  return parsed.success ? parsed.data : null;
}

/** Newest first. Files that are not transaction records are skipped. */
export async function listTransactionRecords(paths: PrefixPaths): Promise<TransactionRecord[]> {
  const files = await fs.readdir(paths.transactions).catch(() => []);
  const records: Array<{ file: string; record: TransactionRecord }> = [];
  for (const file of files.filter((f) => f.endsWith(".json"))) {
    const raw = await fs.readFile(path.join(paths.transactions, file), "utf8").catch(() => "");
    const record = parseRecord(raw);
    if (record) records.push({ file, record });
  }
  records.sort((a, b) => (a.file > b.file ? -1 : 1));
  return records.map((entry) => entry.record);
}
