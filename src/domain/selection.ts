import type { Topic } from "../content/types.js";
import { all } from "../db/sqlite.js";

/**
 * Spread `count` cards across `topics` round-robin, capped by what each topic
 * has. Topics listed first receive the remainder.
 */
export function planDistribution(
  count: number,
  topics: readonly Topic[],
  available: ReadonlyMap<Topic, number>
): Map<Topic, number> {
  const total = topics.reduce((n, t) => n + (available.get(t) ?? 0), 0);
  if (total < count) {
    throw new Error(`Not enough cards for [${topics.join(", ")}]. Need ${count}, got ${total}`);
  }

  const quota = new Map<Topic, number>(topics.map((t) => [t, 0]));
  let remaining = count;
  while (remaining > 0) {
    for (const t of topics) {
      if (remaining === 0) break;
      const q = quota.get(t) ?? 0;
      if (q < (available.get(t) ?? 0)) {
        quota.set(t, q + 1);
        remaining--;
      }
    }
  }
  return quota;
}

export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
  // Fisher–Yates
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

export async function countActiveByTopic(): Promise<Map<Topic, number>> {
  const rows = await all<{ topic: Topic; c: number }>(
    `SELECT topic, COUNT(*) AS c FROM cards WHERE is_active=1 GROUP BY topic`
  );
  return new Map(rows.map((r) => [r.topic, r.c]));
}

async function pickTopic(topic: Topic, n: number): Promise<number[]> {
  if (n === 0) return [];
  const rows = await all<{ id: number }>(
    `SELECT id FROM cards
      WHERE topic = ? AND is_active = 1
      ORDER BY RANDOM() LIMIT ?`,
    [topic, n]
  );
  return rows.map((r) => r.id);
}

/**
 * Select `count` active card ids spread across `topics`, globally shuffled.
 */
export async function selectCardIds(
  count: number,
  topics: readonly Topic[]
): Promise<number[]> {
  const plan = planDistribution(count, topics, await countActiveByTopic());
  const ids: number[] = [];
  for (const [topic, n] of plan) {
    ids.push(...(await pickTopic(topic, n)));
  }
  return shuffle(ids);
}
