import type { CallbackQuery, Message } from "node-telegram-bot-api";
import { finalizeWithReport } from "../../../services/report.service.js";
import { getSessionById } from "../../../services/session.service.js";
import { BaseCardProcessor, type CallbackParserResult } from "./baseCardProcessor.js";

export class SubmitProcessor extends BaseCardProcessor {
  readonly processName = "submit";
  readonly actions = ["sub"] as const;

  protected async handle(msg: Message, query: CallbackQuery, parsed: CallbackParserResult): Promise<void> {
    const sess = await getSessionById(parsed.sessionId);
    if (!sess || sess.status !== "active") {
      await this.safeAnswerCallback(query.id, "This session is already closed.");
      return;
    }
    const { text } = await finalizeWithReport(
      parsed.sessionId,
      this.settings.passPercent,
      this.settings.cooldownDays
    );
    await this.safeAnswerCallback(query.id);
    await this.botService.sendMessage(msg.chat.id, text, { parse_mode: "MarkdownV2" });
    // the card message turns read-only
    await this.refresh(msg, parsed.sessionId, parsed.index);
  }
}
