import type { CallbackQuery, Message } from "node-telegram-bot-api";
import type { Verdict } from "../../../domain/policy.js";
import { getCardAt, getSessionById, markCard, remainingSecondsFor, setCurrentIndex } from "../../../services/session.service.js";
import { BaseCardProcessor, type CallbackParserResult } from "./baseCardProcessor.js";

/**
 * Self-grading: "ok" records a known card, "miss" a missed one, then moves on
 * to the next card when there is one.
 */
export class VerdictProcessor extends BaseCardProcessor {
  readonly processName = "verdict";
  readonly actions = ["ok", "miss"] as const;

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
    const row = await getCardAt(parsed.sessionId, parsed.index);
    if (sess.mode === "exam" && row?.revealed === 0) {
      await this.safeAnswerCallback(query.id, "Reveal the answer first.", true);
      return;
    }

    const verdict: Verdict = parsed.action === "ok" ? "known" : "missed";
    await markCard(parsed.sessionId, parsed.index, verdict);
    await this.safeAnswerCallback(query.id, verdict === "known" ? "Nice!" : "Marked for review");

    const next = parsed.index < sess.total_count ? parsed.index + 1 : parsed.index;
    await setCurrentIndex(parsed.sessionId, next);
    await this.refresh(msg, parsed.sessionId, next);
  }
}
