import { all, get } from "../../db/sqlite.js";
import type { Mode } from "../policy.js";
import type { AdminStatsRepository } from "./adminStatsRepository.js";
import type {
  DeckSummary,
  ExamSummary,
  ModeUsage,
  UsageWindow,
  UserCounts,
} from "./types.js";

export interface ExamRow {
  score_percent: number | null;
  started_at: string;
  finished_at: string | null;
}

const round1 = (n: number): number => +n.toFixed(1);

export function summarizeExams(rows: readonly ExamRow[], passPercent: number): ExamSummary {
  let passes = 0;
  let sumScore = 0;
  let scoreCount = 0;
  let sumMinutes = 0;
  let timeCount = 0;

  for (const r of rows) {
    if (typeof r.score_percent === "number") {
      sumScore += r.score_percent;
      scoreCount++;
      if (r.score_percent >= passPercent) passes++;
    }
    if (r.finished_at) {
      const s = Date.parse(r.started_at);
      const f = Date.parse(r.finished_at);
      if (!Number.isNaN(s) && !Number.isNaN(f) && f > s) {
        sumMinutes += (f - s) / 60000;
        timeCount++;
      }
    }
  }

  const submitted = rows.length;
  return {
    submitted,
    passes,
    fails: submitted - passes,
    passRatePct: submitted ? round1((100 * passes) / submitted) : 0,
    avgScorePct: scoreCount ? round1(sumScore / scoreCount) : null,
    avgMinutes: timeCount ? round1(sumMinutes / timeCount) : null,
  };
}

export class AdminStatsRepositorySqlite implements AdminStatsRepository {
  public async getUserCounts(win: UsageWindow): Promise<UserCounts> {
    const usersTotal = await this.count(`SELECT COUNT(*) AS c FROM users`);
    const usersActiveWindow = await this.count(
      `SELECT COUNT(DISTINCT user_id) AS c
         FROM study_sessions
        WHERE started_at >= ? AND started_at < ?`,
      [win.startIso, win.endIso]
    );
    return { usersTotal, usersActiveWindow };
  }

  public async getModeUsage(win: UsageWindow): Promise<ModeUsage[]> {
    const rows = await all<ModeUsage>(
      `SELECT mode,
              COUNT(*)                AS sessions,
              COUNT(DISTINCT user_id) AS users
         FROM study_sessions
        WHERE started_at >= ? AND started_at < ?
        GROUP BY mode`,
      [win.startIso, win.endIso]
    );
    // both modes present even if zero
    const modes: Mode[] = ["exam", "practice"];
    return modes.map(
      (m) => rows.find((r) => r.mode === m) ?? { mode: m, sessions: 0, users: 0 }
    );
  }

  public async getExamSummary(win: UsageWindow, passPercent: number): Promise<ExamSummary> {
    const rows = await all<ExamRow>(
      `SELECT score_percent, started_at, finished_at
         FROM study_sessions
        WHERE mode='exam' AND status='submitted'
          AND finished_at >= ? AND finished_at < ?`,
      [win.startIso, win.endIso]
    );
    return summarizeExams(rows, passPercent);
  }

  public async getDeckSummary(): Promise<DeckSummary> {
    const activeCards = await this.count(`SELECT COUNT(*) AS c FROM cards WHERE is_active=1`);
    const retiredCards = await this.count(`SELECT COUNT(*) AS c FROM cards WHERE is_active=0`);
    return { activeCards, retiredCards };
  }

  private async count(sql: string, params: readonly unknown[] = []): Promise<number> {
    const row = await get<{ c: number }>(sql, params);
    return row?.c ?? 0;
  }
}
