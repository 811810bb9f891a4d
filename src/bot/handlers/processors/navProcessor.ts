import type { CallbackQuery, Message } from "node-telegram-bot-api";
import { getSessionById, sessionStatuses, setCurrentIndex } from "../../../services/session.service.js";
import { navigatorKeyboard } from "../../keyboards.js";
import { BaseCardProcessor, type CallbackParserResult } from "./baseCardProcessor.js";

export class NavProcessor extends BaseCardProcessor {
  readonly processName = "nav";
  readonly actions = ["prev", "next", "goto", "close", "nav"] as const;

  protected async handle(msg: Message, query: CallbackQuery, parsed: CallbackParserResult): Promise<void> {
    const { action, sessionId, index } = parsed;
    const sess = await getSessionById(sessionId);
    if (!sess) {
      await this.safeAnswerCallback(query.id, "Session not found.");
      return;
    }

    if (action === "nav") {
      const statuses = await sessionStatuses(sessionId);
      await this.safeAnswerCallback(query.id);
      await this.botService.editMessageReplyMarkup(navigatorKeyboard(sessionId, statuses, index), {
        chat_id: msg.chat.id,
        message_id: msg.message_id,
      });
      return;
    }

    const target = action === "prev" ? index - 1 : action === "next" ? index + 1 : index;
    const landed = await setCurrentIndex(sessionId, target);
    await this.safeAnswerCallback(query.id);
    await this.refresh(msg, sessionId, landed);
  }
}
