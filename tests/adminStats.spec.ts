import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDb, initDb } from "../src/db/sqlite.js";
import { syncDeckFromContent } from "../src/db/sync-deck.js";
import { summarizeExams } from "../src/domain/adminstats/adminStatsRepositorySqlite.js";
import { createAdminStatsService } from "../src/domain/adminstats/adminStatsServiceImpl.js";
import type { AdminStats } from "../src/domain/adminstats/types.js";
import { AdminStatsPresenter } from "../src/presentation/adminStatsPresenter.js";
import { createStudySession, finalizeAndSubmit, markCard, revealCard } from "../src/services/session.service.js";
import { upsertUser } from "../src/services/user.service.js";
import { sampleDocs } from "./helpers/fixtures.js";

describe("summarizeExams", () => {
  it("computes pass rate, average score and duration", () => {
    expect(
      summarizeExams(
        [
          { score_percent: 80, started_at: "2026-01-01T10:00:00.000Z", finished_at: "2026-01-01T10:20:00.000Z" },
          { score_percent: 50, started_at: "2026-01-01T11:00:00.000Z", finished_at: "2026-01-01T11:10:00.000Z" },
          { score_percent: 70, started_at: "2026-01-01T12:00:00.000Z", finished_at: null },
        ],
        70
      )
    ).toEqual({
      submitted: 3,
      passes: 2,
      fails: 1,
      passRatePct: 66.7,
      avgScorePct: 66.7,
      avgMinutes: 15,
    });
  });

  it("reports n/a averages for an empty window", () => {
    expect(summarizeExams([], 70)).toEqual({
      submitted: 0,
      passes: 0,
      fails: 0,
      passRatePct: 0,
      avgScorePct: null,
      avgMinutes: null,
    });
  });
});

describe("admin stats service", () => {
  beforeEach(async () => {
    await initDb(":memory:");
    await syncDeckFromContent(sampleDocs());
  });

  afterEach(async () => {
    await closeDb();
  });

  it("aggregates users, sessions, exams and the deck", async () => {
    const ada = await upsertUser({ tg_user_id: 1, first_name: "Ada" });
    await upsertUser({ tg_user_id: 2, first_name: "Bob" });
    const now = new Date();

    await createStudySession(ada, "practice", ["css"], 2, now);
    const exam = await createStudySession(ada, "exam", ["css", "html"], 2, now);
    await revealCard(exam.id, 1);
    await markCard(exam.id, 1, "known");
    await revealCard(exam.id, 2);
    await markCard(exam.id, 2, "known");
    await finalizeAndSubmit(exam.id, 70);

    const stats = await createAdminStatsService().getAdminStats(
      {
        startIso: new Date(now.getTime() - 60_000).toISOString(),
        endIso: new Date(now.getTime() + 3_600_000).toISOString(),
      },
      70
    );

    expect(stats.users).toEqual({ usersTotal: 2, usersActiveWindow: 1 });
    expect(stats.usageByMode).toEqual([
      { mode: "exam", sessions: 1, users: 1 },
      { mode: "practice", sessions: 1, users: 1 },
    ]);
    expect(stats.exam).toMatchObject({ submitted: 1, passes: 1, fails: 0, passRatePct: 100, avgScorePct: 100 });
    expect(stats.deck).toEqual({ activeCards: 4, retiredCards: 0 });
  });
});

describe("AdminStatsPresenter", () => {
  it("renders MarkdownV2 sections", () => {
    const stats: AdminStats = {
      window: { startIso: "2026-01-01", endIso: "2026-01-08" },
      users: { usersTotal: 3, usersActiveWindow: 2 },
      usageByMode: [
        { mode: "exam", sessions: 1, users: 1 },
        { mode: "practice", sessions: 4, users: 2 },
      ],
      exam: { submitted: 1, passes: 0, fails: 1, passRatePct: 0, avgScorePct: 42.5, avgMinutes: null },
      deck: { activeCards: 10, retiredCards: 1 },
    };
    const text = AdminStatsPresenter.toMarkdownV2(stats, "7d");
    expect(text.split("\n\n")).toEqual([
      "*Admin stats* \\(7d\\)\n*Window:* 2026\\-01\\-01 — 2026\\-01\\-08",
      "*Users*\nTotal: *3*\nActive in window: *2*",
      "*Usage by mode*\n• Exam — sessions: *1*, users: *1*\n• Practice — sessions: *4*, users: *2*",
      "*Exam results*\nSubmitted: *1*\nPasses: *0*, Fails: *1*\nPass rate: *0%*\nAvg score: *42\\.5%*\nAvg duration: *n/a*",
      "*Deck*\nActive cards: *10*\nRetired cards: *1*",
    ]);
  });
});
