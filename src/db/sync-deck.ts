import type { ContentDocument, QaPair } from "../content/types.js";
import { logger } from "../logger.js";
import { all, get, run, transaction } from "./sqlite.js";

interface CardMetaRow {
  id: number;
  content_hash: string;
  source_file: string;
  source_line: number;
  is_active: 0 | 1;
}

export interface SyncStats {
  scanned: number;
  inserted: number;
  updated: number;
  deactivated: number;
  /** pairs without an answer, or whose id repeats an earlier pair */
  skipped: number;
}

function needsUpdate(row: CardMetaRow, pair: QaPair, file: string): boolean {
  return (
    row.content_hash !== pair.hash ||
    row.is_active === 0 ||
    row.source_file !== file ||
    row.source_line !== pair.line
  );
}

/**
 * Mirror the Q&A pairs of `docs` into the cards table: new pairs are inserted,
 * edited or moved ones updated, and cards whose pair disappeared deactivated.
 */
export async function syncDeckFromContent(docs: ContentDocument[]): Promise<SyncStats> {
  const stats: SyncStats = { scanned: 0, inserted: 0, updated: 0, deactivated: 0, skipped: 0 };
  const seen = new Set<string>();
  const now = new Date().toISOString();

  await transaction(async () => {
    for (const doc of docs) {
      for (const pair of doc.pairs) {
        stats.scanned++;
        if (pair.answer === "") {
          stats.skipped++;
          continue;
        }
        if (seen.has(pair.id)) {
          logger.warn(`Duplicate card id ${pair.id} in ${doc.file}:${pair.line}, skipped`);
          stats.skipped++;
          continue;
        }
        seen.add(pair.id);

        const existing = await get<CardMetaRow>(
          `SELECT id, content_hash, source_file, source_line, is_active
             FROM cards WHERE source_id=? LIMIT 1`,
          [pair.id]
        );

        if (!existing) {
          await run(
            `INSERT INTO cards (source_id, topic, question, answer, content_hash, source_file, source_line, is_active, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?)`,
            [pair.id, pair.topic, pair.question, pair.answer, pair.hash, doc.file, pair.line, now]
          );
          stats.inserted++;
          continue;
        }

        if (!needsUpdate(existing, pair, doc.file)) continue;

        await run(
          `UPDATE cards
              SET question=?, answer=?, content_hash=?, source_file=?, source_line=?,
                  is_active=1, updated_at=?
            WHERE id=?`,
          [pair.question, pair.answer, pair.hash, doc.file, pair.line, now, existing.id]
        );
        stats.updated++;
      }
    }

    const active = await all<{ id: number; source_id: string }>(
      `SELECT id, source_id FROM cards WHERE is_active=1`
    );
    for (const row of active) {
      if (seen.has(row.source_id)) continue;
      await run(`UPDATE cards SET is_active=0, updated_at=? WHERE id=?`, [now, row.id]);
      stats.deactivated++;
    }
  });

  return stats;
}
