import { existsSync } from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";
import type { Attribution } from "../schemas/transcript.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type AttributionMap = Readonly<Record<string, Attribution>>;

const QUERY = `
  SELECT conversationId, model, COUNT(*) AS edits
  FROM ai_code_hashes
  WHERE conversationId IS NOT NULL
  GROUP BY conversationId, model
  ORDER BY edits DESC
`;

const AttributionRow = z.object({
  conversationId: z.string(),
  model: z.string().nullable(),
  edits: z.number().int(),
});

/**
 * Load model name and code-edit count per conversation from Cursor's AI
 * tracking database. When a conversation used several models, the one with
 * the most edits is reported and the edits of all of them are summed.
 *
 * A missing database is an empty map; an unreadable one is logged and also
 * an empty map.
 */
export function loadAttribution(
  dbPath: string,
  logger: Logger = silentLogger,
): AttributionMap {
  if (!existsSync(dbPath)) return {};

  const result: Record<string, Attribution> = {};
  let db: Database.Database | undefined;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true, timeout: 2000 });
    for (const raw of db.prepare(QUERY).all()) {
      const row = AttributionRow.safeParse(raw);
      if (!row.success) continue;

      const { conversationId, model, edits } = row.data;
      const existing = result[conversationId];
      if (existing) {
        existing.edits += edits;
      } else {
        result[conversationId] = { model: model ?? "", edits };
      }
    }
  } catch (err) {
    logger.warn("Could not read attribution database", {
      dbPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return {};
  } finally {
    db?.close();
  }
  return result;
}
