import type { CallbackQuery, Message } from "node-telegram-bot-api";
import { getSessionById, remainingSecondsFor, revealCard, setCurrentIndex } from "../../../services/session.service.js";
import { BaseCardProcessor, type CallbackParserResult } from "./baseCardProcessor.js";

export class RevealProcessor extends BaseCardProcessor {
  readonly processName = "reveal";
  readonly actions = ["rev"] as const;

  protected async handle(msg: Message, query: CallbackQuery, parsed: CallbackParserResult): Promise<void> {
    const sess = await getSessionById(parsed.sessionId);
    if (!sess || sess.status !== "active") {
      await this.safeAnswerCallback(query.id, "This session is closed.");
      return;
    }
    if (remainingSecondsFor(sess) === 0) {
      await this.safeAnswerCallback(query.id, "Time is up. Your exam is being submitted.", true);
      return;
    }
    await revealCard(parsed.sessionId, parsed.index);
    await setCurrentIndex(parsed.sessionId, parsed.index);
    await this.safeAnswerCallback(query.id);
    await this.refresh(msg, parsed.sessionId, parsed.index);
  }
}
