import type { Topic } from "../content/types.js";
import { all } from "../db/sqlite.js";
import type { Verdict } from "../domain/policy.js";

export interface TopicStats {
  topic: Topic;
  total: number;
  known: number;
}

export interface GradeResult {
  total: number;
  known: number;
  missed: number;
  unanswered: number;
  percent: number; // 0..100
  byTopic: TopicStats[];
}

export interface GradedCard {
  topic: Topic;
  verdict: Verdict | null;
}

/**
 * Unanswered cards count against the score. Topics keep first-seen order.
 */
export function computeGrade(cards: readonly GradedCard[]): GradeResult {
  const byTopic = new Map<Topic, TopicStats>();
  let known = 0;
  let missed = 0;

  for (const card of cards) {
    const stats = byTopic.get(card.topic) ?? { topic: card.topic, total: 0, known: 0 };
    stats.total += 1;
    if (card.verdict === "known") {
      known += 1;
      stats.known += 1;
    } else if (card.verdict === "missed") {
      missed += 1;
    }
    byTopic.set(card.topic, stats);
  }

  const total = cards.length;
  return {
    total,
    known,
    missed,
    unanswered: total - known - missed,
    percent: total > 0 ? Math.round((known / total) * 100) : 0,
    byTopic: [...byTopic.values()],
  };
}

export async function gradeSession(sessionId: string): Promise<GradeResult> {
  const rows = await all<GradedCard>(
    `SELECT c.topic, sc.verdict
       FROM session_cards sc
       JOIN cards c ON c.id = sc.card_id
      WHERE sc.session_id = ?
      ORDER BY sc.q_index ASC`,
    [sessionId]
  );
  return computeGrade(rows);
}
