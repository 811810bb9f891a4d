import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDb, initDb, run } from "../src/db/sqlite.js";
import { syncDeckFromContent } from "../src/db/sync-deck.js";
import {
  abandonSession,
  activeTimedSessions,
  chatForSession,
  createStudySession,
  finalizeAndSubmit,
  getActiveSessionForUser,
  getCardAt,
  markCard,
  progressForSession,
  remainingSecondsFor,
  revealCard,
  sessionStatuses,
  sessionTopics,
  setCurrentIndex,
  setWarnSent,
  getSessionById,
} from "../src/services/session.service.js";
import { canStartExam, getUserById, upsertUser } from "../src/services/user.service.js";
import { sampleDocs } from "./helpers/fixtures.js";

const START = new Date("2026-01-01T10:00:00.000Z");

describe("study sessions", () => {
  let userId: number;

  beforeEach(async () => {
    await initDb(":memory:");
    await syncDeckFromContent(sampleDocs());
    userId = await upsertUser({ tg_user_id: 42, first_name: "Ada" });
  });

  afterEach(async () => {
    await closeDb();
  });

  it("upserts users idempotently", async () => {
    expect(await upsertUser({ tg_user_id: 42, first_name: "Ada", username: "ada" })).toBe(userId);
    expect((await getUserById(userId))?.username).toBe("ada");
  });

  it("opens an untimed practice session on card 1", async () => {
    const sess = await createStudySession(userId, "practice", ["css"], 2, START);
    expect(sess).toMatchObject({
      user_id: userId,
      mode: "practice",
      status: "active",
      topics: "css",
      current_index: 1,
      total_count: 2,
      expires_at: null,
    });
    expect(remainingSecondsFor(sess)).toBeNull();
    expect((await getActiveSessionForUser(userId))?.id).toBe(sess.id);
  });

  it("gives exams a thirty minute deadline", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4, START);
    expect(sess.expires_at).toBe("2026-01-01T10:30:00.000Z");
    expect(remainingSecondsFor(sess, Date.parse("2026-01-01T10:25:00.000Z"))).toBe(300);
    expect(remainingSecondsFor(sess, Date.parse("2026-01-01T11:00:00.000Z"))).toBe(0);
  });

  it("requires a reveal before grading in an exam", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4);
    await expect(markCard(sess.id, 1, "known")).rejects.toThrow("Reveal the answer before grading it");
    await revealCard(sess.id, 1);
    await markCard(sess.id, 1, "known");
    expect((await getCardAt(sess.id, 1))?.verdict).toBe("known");
  });

  it("lets practice grade without a reveal", async () => {
    const sess = await createStudySession(userId, "practice", ["css", "html"], 2, START);
    await markCard(sess.id, 2, "missed");
    expect(await getCardAt(sess.id, 2)).toMatchObject({ revealed: 1, verdict: "missed" });
  });

  it("rejects cards outside the session", async () => {
    const sess = await createStudySession(userId, "practice", ["css"], 2, START);
    await expect(revealCard(sess.id, 9)).rejects.toThrow("Card not in session");
  });

  it("tracks progress and per-card status", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4);
    await revealCard(sess.id, 1);
    await markCard(sess.id, 1, "known");
    await revealCard(sess.id, 2);
    await markCard(sess.id, 2, "missed");
    await revealCard(sess.id, 3);

    expect(await progressForSession(sess.id)).toEqual({ seen: 3, known: 1, missed: 1, total: 4 });
    expect(await sessionStatuses(sess.id)).toEqual(["known", "missed", "revealed", "unseen"]);
  });

  it("clamps the current index", async () => {
    const sess = await createStudySession(userId, "practice", ["css", "html"], 4, START);
    expect(await setCurrentIndex(sess.id, 10)).toBe(4);
    expect(await setCurrentIndex(sess.id, 0)).toBe(1);
    expect((await getSessionById(sess.id))?.current_index).toBe(1);
  });

  it("grades a failed exam and starts the cooldown", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4);
    await revealCard(sess.id, 1);
    await markCard(sess.id, 1, "known");

    const { result, passed, session } = await finalizeAndSubmit(sess.id, 70);
    expect(passed).toBe(false);
    expect(result).toMatchObject({ total: 4, known: 1, missed: 0, unanswered: 3, percent: 25 });
    expect(session).toMatchObject({ status: "submitted", known_count: 1, score_percent: 25 });
    await expect(finalizeAndSubmit(sess.id, 70)).rejects.toThrow("Session is not active");

    const user = await getUserById(userId);
    expect(user?.last_failed_at).toBe(session.finished_at);
    const eligibility = await canStartExam(userId, 3);
    expect(eligibility.ok).toBe(false);
    expect(eligibility.nextIso).toBe(
      new Date(Date.parse(session.finished_at ?? "") + 3 * 86_400_000).toISOString().slice(0, 10)
    );
  });

  it("does not start a cooldown for practice", async () => {
    const sess = await createStudySession(userId, "practice", ["css"], 2, START);
    const { passed } = await finalizeAndSubmit(sess.id, 70);
    expect(passed).toBe(false);
    expect((await getUserById(userId))?.last_failed_at).toBeNull();
    expect((await canStartExam(userId, 3)).ok).toBe(true);
  });

  it("abandons a session", async () => {
    const sess = await createStudySession(userId, "practice", ["css"], 2, START);
    await abandonSession(sess.id);
    expect((await getSessionById(sess.id))?.status).toBe("expired");
    expect(await getActiveSessionForUser(userId)).toBeUndefined();
  });

  it("lists running exams with their warning flags and chat", async () => {
    await createStudySession(userId, "practice", ["css"], 2, START);
    const exam = await createStudySession(userId, "exam", ["html"], 2, START);
    await setWarnSent(exam.id, 300);

    const timed = await activeTimedSessions();
    expect(timed.map((s) => [s.id, s.warn5_sent, s.warn1_sent])).toEqual([[exam.id, 1, 0]]);
    expect(await chatForSession(exam.id)).toEqual({ user_id: userId, tg_user_id: 42 });
  });

  it("parses stored topics", () => {
    expect(sessionTopics({ topics: "css,html,bogus" })).toEqual(["css", "html"]);
  });

  it("lets a direct update of last_failed_at expire", async () => {
    await run(`UPDATE users SET last_failed_at=? WHERE id=?`, ["2000-01-01T00:00:00.000Z", userId]);
    expect(await canStartExam(userId, 3)).toEqual({ ok: true, nextIso: null });
  });

  it("stops reveals and verdicts once an exam is past its deadline", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4, START);
    await expect(revealCard(sess.id, 1)).rejects.toThrow("Time is up");
    await expect(markCard(sess.id, 1, "known")).rejects.toThrow("Time is up");
    const { session } = await finalizeAndSubmit(sess.id, 70);
    expect(session.status).toBe("submitted");
  });

  it("opens sessions for two users at the same moment", async () => {
    const other = await upsertUser({ tg_user_id: 43, first_name: "Bob" });
    const outcomes = await Promise.allSettled([
      createStudySession(userId, "practice", ["css", "html"], 4),
      createStudySession(other, "practice", ["css", "html"], 4),
    ]);
    expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "fulfilled"]);
    expect((await getActiveSessionForUser(userId))?.total_count).toBe(4);
    expect((await getActiveSessionForUser(other))?.total_count).toBe(4);
  });

  it("grades a session once when two submits race", async () => {
    const sess = await createStudySession(userId, "exam", ["css", "html"], 4);
    const outcomes = await Promise.allSettled([
      finalizeAndSubmit(sess.id, 70),
      finalizeAndSubmit(sess.id, 70),
    ]);
    expect(outcomes.map((o) => o.status).sort()).toEqual(["fulfilled", "rejected"]);
    const rejected = outcomes.find((o) => o.status === "rejected");
    expect(rejected?.status === "rejected" && String(rejected.reason)).toBe(
      "Error: Session is not active"
    );
    expect((await getSessionById(sess.id))?.status).toBe("submitted");
  });
});
