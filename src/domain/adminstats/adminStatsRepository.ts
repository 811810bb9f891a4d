import type {
  DeckSummary,
  ExamSummary,
  ModeUsage,
  UsageWindow,
  UserCounts,
} from "./types.js";

export interface AdminStatsRepository {
  getUserCounts(win: UsageWindow): Promise<UserCounts>;
  getModeUsage(win: UsageWindow): Promise<ModeUsage[]>;
  getExamSummary(win: UsageWindow, passPercent: number): Promise<ExamSummary>;
  getDeckSummary(): Promise<DeckSummary>;
}
