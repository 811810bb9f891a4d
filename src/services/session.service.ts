import { nanoid } from "nanoid";
import { isTopic } from "../content/topics.js";
import type { Topic } from "../content/types.js";
import { all, get, run, transaction } from "../db/sqlite.js";
import { EXAM_DURATION_MIN, type Mode, type Verdict, type WarnThreshold } from "../domain/policy.js";
import { selectCardIds } from "../domain/selection.js";
import { gradeSession, type GradeResult } from "./scoring.service.js";

export type SessionStatus = "active" | "submitted" | "expired";
export type CardStatus = "unseen" | "revealed" | "known" | "missed";

export interface StudySession {
  id: string;
  user_id: number;
  mode: Mode;
  status: SessionStatus;
  /** comma-separated topics the deck was drawn from */
  topics: string;
  started_at: string;
  expires_at: string | null;
  finished_at: string | null;
  current_index: number;
  total_count: number;
  known_count: number | null;
  score_percent: number | null;
  warn5_sent: 0 | 1;
  warn1_sent: 0 | 1;
}

export interface SessionCardRow {
  card_id: number;
  q_index: number;
  revealed: 0 | 1;
  verdict: Verdict | null;
}

export interface SessionProgress {
  seen: number;
  known: number;
  missed: number;
  total: number;
}

export function getActiveSessionForUser(
  userId: number
): Promise<StudySession | undefined> {
  return get<StudySession>(
    `SELECT * FROM study_sessions
      WHERE user_id=? AND status='active'
      ORDER BY started_at DESC LIMIT 1`,
    [userId]
  );
}

export function getSessionById(sessionId: string): Promise<StudySession | undefined> {
  return get<StudySession>(`SELECT * FROM study_sessions WHERE id=? LIMIT 1`, [sessionId]);
}

async function requireActive(sessionId: string): Promise<StudySession> {
  const sess = await getSessionById(sessionId);
  if (!sess) throw new Error("Session not found");
  if (sess.status !== "active") throw new Error("Session is not active");
  return sess;
}

// an exam past its deadline only waits for submission
async function requireOpen(sessionId: string): Promise<StudySession> {
  const sess = await requireActive(sessionId);
  if (remainingSecondsFor(sess) === 0) throw new Error("Time is up");
  return sess;
}

/**
 * Draws a deck and opens a session on card 1. Exams get an expiry,
 * practice is untimed.
 */
export async function createStudySession(
  userId: number,
  mode: Mode,
  topics: readonly Topic[],
  size: number,
  now: Date = new Date()
): Promise<StudySession> {
  const id = nanoid();
  const expiresAt =
    mode === "exam" ? new Date(now.getTime() + EXAM_DURATION_MIN * 60_000) : null;

  const ids = await selectCardIds(size, topics);

  await transaction(async () => {
    await run(
      `INSERT INTO study_sessions (id, user_id, mode, status, topics, started_at, expires_at, total_count, current_index)
       VALUES (?, ?, ?, 'active', ?, ?, ?, ?, 1)`,
      [id, userId, mode, topics.join(","), now.toISOString(), expiresAt?.toISOString() ?? null, ids.length]
    );
    let qIndex = 1;
    for (const cardId of ids) {
      await run(
        `INSERT INTO session_cards (session_id, card_id, q_index) VALUES (?, ?, ?)`,
        [id, cardId, qIndex++]
      );
    }
  });

  const sess = await getSessionById(id);
  if (!sess) throw new Error("Failed to create session");
  return sess;
}

export function getCardAt(
  sessionId: string,
  index: number
): Promise<SessionCardRow | undefined> {
  return get<SessionCardRow>(
    `SELECT card_id, q_index, revealed, verdict
       FROM session_cards WHERE session_id=? AND q_index=?`,
    [sessionId, index]
  );
}

export async function setCurrentIndex(sessionId: string, index: number): Promise<number> {
  const sess = await getSessionById(sessionId);
  if (!sess) throw new Error("Session not found");
  const clamped = Math.min(Math.max(1, index), sess.total_count);
  await run(`UPDATE study_sessions SET current_index=? WHERE id=?`, [clamped, sessionId]);
  return clamped;
}

export async function revealCard(sessionId: string, index: number): Promise<void> {
  await requireOpen(sessionId);
  const res = await run(
    `UPDATE session_cards SET revealed=1 WHERE session_id=? AND q_index=?`,
    [sessionId, index]
  );
  if (res.changes === 0) throw new Error("Card not in session");
}

/**
 * Record a self-assessed verdict. In an exam the answer has to be revealed
 * first; practice may grade straight away.
 */
export async function markCard(
  sessionId: string,
  index: number,
  verdict: Verdict
): Promise<void> {
  const sess = await requireOpen(sessionId);
  const row = await getCardAt(sessionId, index);
  if (!row) throw new Error("Card not in session");
  if (sess.mode === "exam" && row.revealed === 0) {
    throw new Error("Reveal the answer before grading it");
  }
  await run(
    `UPDATE session_cards
        SET verdict=?, revealed=1, answered_at=?
      WHERE session_id=? AND q_index=?`,
    [verdict, new Date().toISOString(), sessionId, index]
  );
}

export async function progressForSession(sessionId: string): Promise<SessionProgress> {
  const row = await get<SessionProgress>(
    `SELECT
       COALESCE(SUM(CASE WHEN revealed=1 OR verdict IS NOT NULL THEN 1 ELSE 0 END), 0) AS seen,
       COALESCE(SUM(CASE WHEN verdict='known' THEN 1 ELSE 0 END), 0) AS known,
       COALESCE(SUM(CASE WHEN verdict='missed' THEN 1 ELSE 0 END), 0) AS missed,
       COUNT(*) AS total
     FROM session_cards WHERE session_id=?`,
    [sessionId]
  );
  return row ?? { seen: 0, known: 0, missed: 0, total: 0 };
}

export async function sessionStatuses(sessionId: string): Promise<CardStatus[]> {
  const rows = await all<SessionCardRow>(
    `SELECT card_id, q_index, revealed, verdict
       FROM session_cards WHERE session_id=? ORDER BY q_index ASC`,
    [sessionId]
  );
  return rows.map((r) => r.verdict ?? (r.revealed === 1 ? "revealed" : "unseen"));
}

export function remainingSecondsFor(
  sess: Pick<StudySession, "expires_at" | "status">,
  nowMs: number = Date.now()
): number | null {
  if (!sess.expires_at || sess.status !== "active") return null;
  const diffMs = Date.parse(sess.expires_at) - nowMs;
  return Math.max(0, Math.floor(diffMs / 1000));
}

export async function remainingSeconds(
  sessionId: string,
  nowMs: number = Date.now()
): Promise<number | null> {
  const sess = await getSessionById(sessionId);
  return sess ? remainingSecondsFor(sess, nowMs) : null;
}

/**
 * Grade and close the session. A failed exam starts the user's cooldown.
 */
export async function finalizeAndSubmit(
  sessionId: string,
  passPercent: number
): Promise<{ result: GradeResult; passed: boolean; session: StudySession }> {
  const sess = await requireActive(sessionId);
  const result = await gradeSession(sessionId);
  const passed = result.percent >= passPercent;
  const finishedAt = new Date().toISOString();

  await transaction(async () => {
    const res = await run(
      `UPDATE study_sessions
          SET status='submitted', finished_at=?, known_count=?, score_percent=?
        WHERE id=? AND status='active'`,
      [finishedAt, result.known, result.percent, sessionId]
    );
    // a concurrent submit got there first
    if (res.changes === 0) throw new Error("Session is not active");
    if (sess.mode === "exam" && !passed) {
      await run(`UPDATE users SET last_failed_at=? WHERE id=?`, [finishedAt, sess.user_id]);
    }
  });

  const updated = await getSessionById(sessionId);
  if (!updated) throw new Error("Session not found");
  return { result, passed, session: updated };
}

export async function abandonSession(sessionId: string): Promise<void> {
  await run(
    `UPDATE study_sessions
        SET status='expired', finished_at=?
      WHERE id=? AND status='active'`,
    [new Date().toISOString(), sessionId]
  );
}

export async function setWarnSent(sessionId: string, threshold: WarnThreshold): Promise<void> {
  const col = threshold === 300 ? "warn5_sent" : "warn1_sent";
  await run(`UPDATE study_sessions SET ${col}=1 WHERE id=?`, [sessionId]);
}

export function activeTimedSessions(): Promise<StudySession[]> {
  return all<StudySession>(
    `SELECT * FROM study_sessions
      WHERE status='active' AND mode='exam' AND expires_at IS NOT NULL`
  );
}

export function chatForSession(
  sessionId: string
): Promise<{ user_id: number; tg_user_id: number } | undefined> {
  return get<{ user_id: number; tg_user_id: number }>(
    `SELECT u.id AS user_id, u.tg_user_id AS tg_user_id
       FROM study_sessions s
       JOIN users u ON u.id = s.user_id
      WHERE s.id=? LIMIT 1`,
    [sessionId]
  );
}

export function sessionTopics(sess: Pick<StudySession, "topics">): Topic[] {
  return sess.topics.split(",").filter(isTopic);
}

export interface SessionService {
  getActiveSessionForUser(userId: number): Promise<StudySession | undefined>;
  getSessionById(sessionId: string): Promise<StudySession | undefined>;
  createStudySession(
    userId: number,
    mode: Mode,
    topics: readonly Topic[],
    size: number
  ): Promise<StudySession>;
  getCardAt(sessionId: string, index: number): Promise<SessionCardRow | undefined>;
  setCurrentIndex(sessionId: string, index: number): Promise<number>;
  revealCard(sessionId: string, index: number): Promise<void>;
  markCard(sessionId: string, index: number, verdict: Verdict): Promise<void>;
  progressForSession(sessionId: string): Promise<SessionProgress>;
  sessionStatuses(sessionId: string): Promise<CardStatus[]>;
  remainingSeconds(sessionId: string): Promise<number | null>;
  finalizeAndSubmit(
    sessionId: string,
    passPercent: number
  ): Promise<{ result: GradeResult; passed: boolean; session: StudySession }>;
  abandonSession(sessionId: string): Promise<void>;
}

export const sessionService: SessionService = {
  getActiveSessionForUser,
  getSessionById,
  createStudySession,
  getCardAt,
  setCurrentIndex,
  revealCard,
  markCard,
  progressForSession,
  sessionStatuses,
  remainingSeconds,
  finalizeAndSubmit,
  abandonSession,
};
