import { get, run } from "../db/sqlite.js";

export interface TgUserLite {
  tg_user_id: number;
  first_name?: string | null;
  last_name?: string | null;
  username?: string | null;
}

export interface UserRow {
  id: number;
  tg_user_id: number;
  first_name: string | null;
  last_name: string | null;
  username: string | null;
  created_at: string;
  last_seen_at: string;
  last_failed_at: string | null;
}

/**
 * Upserts a Telegram user and returns the internal numeric user id.
 */
export async function upsertUser(u: TgUserLite): Promise<number> {
  await run(
    `INSERT INTO users (tg_user_id, first_name, last_name, username, last_seen_at)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(tg_user_id) DO UPDATE SET
       first_name=excluded.first_name,
       last_name=excluded.last_name,
       username=excluded.username,
       last_seen_at=excluded.last_seen_at`,
    [
      u.tg_user_id,
      u.first_name ?? null,
      u.last_name ?? null,
      u.username ?? null,
      new Date().toISOString(),
    ]
  );
  const row = await get<{ id: number }>(
    `SELECT id FROM users WHERE tg_user_id=? LIMIT 1`,
    [u.tg_user_id]
  );
  if (!row) throw new Error("User upserted but id not found");
  return row.id;
}

export function getUserById(id: number): Promise<UserRow | undefined> {
  return get<UserRow>(`SELECT * FROM users WHERE id=? LIMIT 1`, [id]);
}

export interface ExamEligibility {
  ok: boolean;
  /** YYYY-MM-DD of the first day a new exam is allowed, when blocked */
  nextIso: string | null;
}

export function examEligibility(
  lastFailedAt: string | null,
  cooldownDays: number,
  nowMs: number = Date.now()
): ExamEligibility {
  if (!lastFailedAt) return { ok: true, nextIso: null };
  const nextMs = Date.parse(lastFailedAt) + cooldownDays * 24 * 60 * 60 * 1000;
  return nowMs >= nextMs
    ? { ok: true, nextIso: null }
    : { ok: false, nextIso: new Date(nextMs).toISOString().slice(0, 10) };
}

export async function canStartExam(
  userId: number,
  cooldownDays: number
): Promise<ExamEligibility> {
  const user = await getUserById(userId);
  return examEligibility(user?.last_failed_at ?? null, cooldownDays);
}

export interface UserService {
  getUserById(id: number): Promise<UserRow | undefined>;
  upsertUser(u: TgUserLite): Promise<number>;
  canStartExam(userId: number, cooldownDays: number): Promise<ExamEligibility>;
}

export const userService: UserService = {
  getUserById,
  upsertUser,
  canStartExam,
};
