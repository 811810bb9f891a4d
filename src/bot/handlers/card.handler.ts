import type TelegramBot from "node-telegram-bot-api";
import { getCardById } from "../../services/card.service.js";
import { getCardAt, getSessionById, type CardStatus } from "../../services/session.service.js";
import type { BotService } from "../../services/bot.service.js";
import { cardControls } from "../keyboards.js";
import {
  MESSAGE_LIMIT,
  renderCardBack,
  renderCardFront,
  renderCardHeader,
  renderVerdict,
} from "../views.js";
import type { BaseCardProcessor } from "./processors/baseCardProcessor.js";

/**
 * Route callback queries to the first processor whose pattern matches.
 */
export function registerCardHandlers(
  botService: BotService,
  processors: readonly BaseCardProcessor[]
): void {
  botService.onCallbackQuery(async (q: TelegramBot.CallbackQuery): Promise<void> => {
    const msg = q.message;
    if (!msg) return;
    const data = q.data ?? "";
    for (const processor of processors) {
      const parsed = processor.parse(data);
      if (parsed !== null) {
        await processor.process(msg, q, parsed);
        return;
      }
    }
  });
}

/**
 * Renders the card at `index`:
 * - active and unseen: question only, with reveal (and in practice grade) buttons
 * - revealed, graded or finished session: question and answer
 */
export async function showCard(
  botService: BotService,
  chatId: number,
  sessionId: string,
  index: number,
  reuseMessageId?: number
): Promise<void> {
  const sess = await getSessionById(sessionId);
  if (!sess) {
    await botService.sendMessage(chatId, "Session not found.");
    return;
  }
  const row = await getCardAt(sessionId, index);
  if (!row) {
    await botService.sendMessage(chatId, "Card not found.");
    return;
  }

  const card = await getCardById(row.card_id);
  const status: CardStatus = row.verdict ?? (row.revealed === 1 ? "revealed" : "unseen");
  const active = sess.status === "active";

  const parts: string[] = [
    renderCardHeader(index, sess.total_count, card.topic, sess.mode),
    renderCardFront(card),
  ];
  if (!active || status !== "unseen") {
    const used = parts.join("\n\n").length + 64;
    parts.push(`*Answer*\n${renderCardBack(card, MESSAGE_LIMIT - used)}`);
  }
  if (active && status !== "unseen") parts.push(renderVerdict(status));

  const text = parts.join("\n\n");
  const reply_markup = cardControls({
    sessionId,
    index,
    total: sess.total_count,
    status,
    mode: sess.mode,
    active,
  });

  if (reuseMessageId) {
    await botService.editMessageText(text, {
      chat_id: chatId,
      message_id: reuseMessageId,
      parse_mode: "MarkdownV2",
      reply_markup,
    });
  } else {
    await botService.sendMessage(chatId, text, { parse_mode: "MarkdownV2", reply_markup });
  }
}
