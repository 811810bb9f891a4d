import type { Topic } from "../content/types.js";
import { all, get } from "../db/sqlite.js";

export interface CardRow {
  id: number;
  source_id: string;
  topic: Topic;
  question: string;
  answer: string;
  content_hash: string;
  source_file: string;
  source_line: number;
  is_active: 0 | 1;
  updated_at: string;
}

export interface TopicCount {
  topic: Topic;
  cards: number;
}

export async function getCardById(id: number): Promise<CardRow> {
  const row = await get<CardRow>(`SELECT * FROM cards WHERE id=? LIMIT 1`, [id]);
  if (!row) throw new Error(`Card not found: ${id}`);
  return row;
}

export function getCardBySourceId(sourceId: string): Promise<CardRow | undefined> {
  return get<CardRow>(`SELECT * FROM cards WHERE source_id=? LIMIT 1`, [sourceId]);
}

export function topicCounts(): Promise<TopicCount[]> {
  return all<TopicCount>(
    `SELECT topic, COUNT(*) AS cards
       FROM cards WHERE is_active=1
      GROUP BY topic ORDER BY topic`
  );
}

export interface CardService {
  getCardById(id: number): Promise<CardRow>;
  topicCounts(): Promise<TopicCount[]>;
}

export const cardService: CardService = {
  getCardById,
  topicCounts,
};
