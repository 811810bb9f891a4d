import { topicLabel } from "../content/topics.js";
import type { Topic } from "../content/types.js";
import type { CardRow } from "../services/card.service.js";
import type { CardStatus, SessionProgress } from "../services/session.service.js";

/** Telegram rejects messages longer than this */
export const MESSAGE_LIMIT = 4096;

// Escape for Telegram MarkdownV2 (NOT legacy)
// Special set: _ * [ ] ( ) ~ ` > # + - = | { } . ! and backslash itself.
export function escapeMdV2(s: string): string {
  return s.replace(/([_*[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

// Inside pre/code entities only ` and \ need escaping
export function escapeMdV2Code(s: string): string {
  return s.replace(/([`\\])/g, "\\$1");
}

/**
 * Prose with `inline code` kept as code spans and everything else escaped.
 */
export function inlineToMdV2(text: string): string {
  return text
    .split(/(`[^`\n]+`)/)
    .map((part) =>
      /^`[^`\n]+`$/.test(part)
        ? `\`${escapeMdV2Code(part.slice(1, -1))}\``
        : escapeMdV2(part)
    )
    .join("");
}

/**
 * Convert a Markdown answer to MarkdownV2: fenced code becomes pre blocks,
 * prose is escaped line by line.
 */
export function answerToMdV2(markdown: string): string {
  const out: string[] = [];
  const lines = markdown.split("\n");
  let fence: { marker: string; lang: string; body: string[] } | null = null;

  for (const line of lines) {
    if (fence) {
      if (line.trim().startsWith(fence.marker) && line.trim().replace(/[`~]/g, "") === "") {
        out.push(`\`\`\`${fence.lang}\n${escapeMdV2Code(fence.body.join("\n"))}\n\`\`\``);
        fence = null;
      } else {
        fence.body.push(line);
      }
      continue;
    }
    const open = /^\s{0,3}(`{3,}|~{3,})\s*([\w+-]*)/.exec(line);
    if (open) {
      fence = { marker: open[1], lang: open[2], body: [] };
      continue;
    }
    out.push(inlineToMdV2(line));
  }
  if (fence) {
    out.push(`\`\`\`${fence.lang}\n${escapeMdV2Code(fence.body.join("\n"))}\n\`\`\``);
  }
  return out.join("\n");
}

export function renderCardHeader(
  index: number,
  total: number,
  topic: Topic,
  mode: "exam" | "practice"
): string {
  const kind = mode === "exam" ? "Exam" : "Practice";
  return `*Card ${index}/${total}*  ·  _${escapeMdV2(topicLabel(topic))}_  ·  ${kind}`;
}

export function renderCardFront(card: Pick<CardRow, "question">): string {
  return `❓ *${inlineToMdV2(card.question)}*`;
}

/**
 * Answer block, falling back to escaped plain text cut to fit when the
 * formatted answer would not fit in one message.
 */
export function renderCardBack(card: Pick<CardRow, "answer">, budget: number): string {
  const formatted = answerToMdV2(card.answer);
  if (formatted.length <= budget) return formatted;
  const suffix = "\n…";
  let cut = card.answer.slice(0, Math.max(0, budget));
  while (cut.length > 0 && escapeMdV2(cut).length + escapeMdV2(suffix).length > budget) {
    cut = cut.slice(0, Math.floor(cut.length * 0.9));
  }
  return escapeMdV2(cut + suffix);
}

export function renderVerdict(status: CardStatus): string {
  switch (status) {
    case "known":
      return "✅ You knew this one\\.";
    case "missed":
      return "📌 Marked for review\\.";
    case "revealed":
      return "👀 Answer revealed\\. Did you know it?";
    case "unseen":
      return "";
  }
}

export function renderProgress(p: SessionProgress, timeLeft?: string): string {
  const time = timeLeft ? `\n⏱ *Time left:* ${escapeMdV2(timeLeft)}` : "";
  return (
    `*Progress*\n` +
    `👀 Seen: *${p.seen}*/${p.total}\n` +
    `✅ Known: *${p.known}*\n` +
    `📌 Missed: *${p.missed}*\n` +
    `◯ Left: *${p.total - p.known - p.missed}*${time}`
  );
}

export function renderTopics(counts: Array<{ topic: Topic; cards: number }>): string {
  if (counts.length === 0) return "The deck is empty\\.";
  const lines = counts.map(
    (c) => `• ${escapeMdV2(topicLabel(c.topic))} \\(\`${c.topic}\`\\): *${c.cards}* cards`
  );
  return `*Topics*\n${lines.join("\n")}\n\nStart with /practice \\<topic\\> or /exam`;
}
