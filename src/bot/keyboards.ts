import type TelegramBot from "node-telegram-bot-api";
import type { Mode } from "../domain/policy.js";
import type { CardStatus } from "../services/session.service.js";

type Button = TelegramBot.InlineKeyboardButton;

export interface CardControlsOptions {
  sessionId: string;
  index: number;
  total: number;
  status: CardStatus;
  mode: Mode;
  active: boolean;
}

function btn(text: string, action: string, sessionId: string, index: number): Button {
  return { text, callback_data: `${action}:${sessionId}:${index}` };
}

export function cardControls(o: CardControlsOptions): TelegramBot.InlineKeyboardMarkup {
  const rows: Button[][] = [];

  if (o.active) {
    const grade: Button[] = [];
    if (o.status === "unseen") grade.push(btn("👀 Reveal", "rev", o.sessionId, o.index));
    // practice may grade without revealing
    if (o.status !== "unseen" || o.mode === "practice") {
      grade.push(btn("✅ Knew it", "ok", o.sessionId, o.index));
      grade.push(btn("📌 Missed", "miss", o.sessionId, o.index));
    }
    rows.push(grade);
  }

  const nav: Button[] = [];
  if (o.index > 1) nav.push(btn("◀ Prev", "prev", o.sessionId, o.index));
  nav.push(btn(`🧭 ${o.index}/${o.total}`, "nav", o.sessionId, o.index));
  if (o.index < o.total) nav.push(btn("Next ▶", "next", o.sessionId, o.index));
  rows.push(nav);

  if (o.active) rows.push([btn("🏁 Finish", "sub", o.sessionId, o.index)]);

  return { inline_keyboard: rows };
}

const STATUS_MARK: Record<CardStatus, string> = {
  unseen: "◯",
  revealed: "👀",
  known: "✅",
  missed: "📌",
};

export function navigatorKeyboard(
  sessionId: string,
  statuses: readonly CardStatus[],
  current: number,
  perRow = 5
): TelegramBot.InlineKeyboardMarkup {
  const rows: Button[][] = [];
  for (let i = 0; i < statuses.length; i += perRow) {
    rows.push(
      statuses
        .slice(i, i + perRow)
        .map((st, j) => btn(`${STATUS_MARK[st]}${i + j + 1}`, "goto", sessionId, i + j + 1))
    );
  }
  rows.push([btn("Close", "close", sessionId, current)]);
  return { inline_keyboard: rows };
}
