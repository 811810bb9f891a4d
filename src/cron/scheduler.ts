import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../logger.js";
import { WARN_THRESHOLDS, type WarnThreshold } from "../domain/policy.js";
import type { BotService } from "../services/bot.service.js";
import { finalizeWithReport } from "../services/report.service.js";
import {
  activeTimedSessions,
  chatForSession,
  remainingSecondsFor,
  setWarnSent,
  type StudySession,
} from "../services/session.service.js";
import type { BotSettings } from "../services/services.js";
import { humanTimeLeft } from "../services/timer.service.js";
import { escapeMdV2 } from "../bot/views.js";

export type ScanAction =
  | { kind: "submitted"; sessionId: string; passed: boolean }
  | { kind: "warned"; sessionId: string; threshold: WarnThreshold };

function warnSent(sess: StudySession, threshold: WarnThreshold): boolean {
  return (threshold === 300 ? sess.warn5_sent : sess.warn1_sent) === 1;
}

/**
 * Pick the tightest threshold not yet announced. A session that skipped past
 * the 5 minute mark gets only the 1 minute warning.
 */
export function dueWarning(sess: StudySession, remaining: number): WarnThreshold | null {
  const sorted = [...WARN_THRESHOLDS].sort((a, b) => a - b);
  for (const t of sorted) {
    if (remaining <= t) return warnSent(sess, t) ? null : t;
  }
  return null;
}

async function scanSession(
  botService: BotService,
  settings: BotSettings,
  sess: StudySession,
  nowMs: number
): Promise<ScanAction | null> {
  const rem = remainingSecondsFor(sess, nowMs);
  if (rem === null) return null;

  const dest = await chatForSession(sess.id);
  if (!dest) return null;
  const chatId = dest.tg_user_id;

  if (rem <= 0) {
    const { text, passed } = await finalizeWithReport(
      sess.id,
      settings.passPercent,
      settings.cooldownDays
    );
    await botService.sendMessage(
      chatId,
      `⏰ Time is up\\. Your exam was auto\\-submitted\\.\n\n${text}`,
      { parse_mode: "MarkdownV2" }
    );
    return { kind: "submitted", sessionId: sess.id, passed };
  }

  const threshold = dueWarning(sess, rem);
  if (threshold === null) return null;
  await setWarnSent(sess.id, threshold);
  // a later threshold also covers the earlier one
  if (threshold === 60) await setWarnSent(sess.id, 300);
  await botService.sendMessage(
    chatId,
    `⏱ *${escapeMdV2(humanTimeLeft(rem))}* remaining\\. Use /submit when you are done\\.`,
    { parse_mode: "MarkdownV2" }
  );
  return { kind: "warned", sessionId: sess.id, threshold };
}

/**
 * One pass over running exams: auto-submit the expired ones, send due warnings.
 * A failing session is logged and skipped; the rest of the pass goes on.
 */
export async function scanTimedSessions(
  botService: BotService,
  settings: BotSettings,
  nowMs: number = Date.now()
): Promise<ScanAction[]> {
  const actions: ScanAction[] = [];
  for (const sess of await activeTimedSessions()) {
    try {
      const action = await scanSession(botService, settings, sess, nowMs);
      if (action) actions.push(action);
    } catch (e) {
      logger.error("Scheduler failed on session", {
        sessionId: sess.id,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }
  return actions;
}

export function startScheduler(
  botService: BotService,
  settings: BotSettings
): ScheduledTask {
  // every 30s
  return cron.schedule("*/30 * * * * *", () => {
    scanTimedSessions(botService, settings)
      .then((actions) => {
        if (actions.length > 0) logger.debug("Scheduler pass", { actions });
      })
      .catch((e: unknown) =>
        logger.error("Scheduler pass failed", {
          error: e instanceof Error ? e.message : String(e),
        })
      );
  });
}
