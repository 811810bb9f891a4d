import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { scanTimedSessions } from "../src/cron/scheduler.js";
import { closeDb, initDb } from "../src/db/sqlite.js";
import { syncDeckFromContent } from "../src/db/sync-deck.js";
import type { BotSettings } from "../src/services/services.js";
import { createStudySession, getSessionById, type StudySession } from "../src/services/session.service.js";
import { upsertUser } from "../src/services/user.service.js";
import type TelegramBot from "node-telegram-bot-api";
import { FakeBotService } from "./helpers/fakeBot.js";
import { sampleDocs } from "./helpers/fixtures.js";

const settings: BotSettings = { deckSize: 2, passPercent: 70, cooldownDays: 3, adminIds: [] };
const START = new Date("2026-01-01T10:00:00.000Z");
const at = (hhmmss: string): number => Date.parse(`2026-01-01T${hhmmss}.000Z`);

describe("scanTimedSessions", () => {
  let bot: FakeBotService;
  let exam: StudySession;

  beforeEach(async () => {
    await initDb(":memory:");
    await syncDeckFromContent(sampleDocs());
    const userId = await upsertUser({ tg_user_id: 42, first_name: "Ada" });
    await createStudySession(userId, "practice", ["css"], 2, START);
    exam = await createStudySession(userId, "exam", ["html"], 2, START);
    bot = new FakeBotService();
  });

  afterEach(async () => {
    await closeDb();
  });

  it("does nothing while plenty of time is left", async () => {
    expect(await scanTimedSessions(bot, settings, at("10:10:00"))).toEqual([]);
    expect(bot.sent).toEqual([]);
  });

  it("warns once at five minutes and once at one minute", async () => {
    expect(await scanTimedSessions(bot, settings, at("10:26:00"))).toEqual([
      { kind: "warned", sessionId: exam.id, threshold: 300 },
    ]);
    expect(bot.lastSent()).toMatchObject({
      chatId: 42,
      text: "⏱ *04:00* remaining\\. Use /submit when you are done\\.",
    });

    expect(await scanTimedSessions(bot, settings, at("10:26:30"))).toEqual([]);

    expect(await scanTimedSessions(bot, settings, at("10:29:30"))).toEqual([
      { kind: "warned", sessionId: exam.id, threshold: 60 },
    ]);
    expect(bot.lastSent().text).toBe("⏱ *00:30* remaining\\. Use /submit when you are done\\.");
    expect(bot.sent).toHaveLength(2);
  });

  it("skips the five minute warning when already inside the last minute", async () => {
    expect(await scanTimedSessions(bot, settings, at("10:29:40"))).toEqual([
      { kind: "warned", sessionId: exam.id, threshold: 60 },
    ]);
    expect(await scanTimedSessions(bot, settings, at("10:29:50"))).toEqual([]);
    expect(bot.sent).toHaveLength(1);
  });

  it("auto-submits an expired exam", async () => {
    expect(await scanTimedSessions(bot, settings, at("10:31:00"))).toEqual([
      { kind: "submitted", sessionId: exam.id, passed: false },
    ]);
    expect(bot.lastSent().text.startsWith(
      "⏰ Time is up\\. Your exam was auto\\-submitted\\.\n\n❌ *Score:* 0/2 \\- *0%*"
    )).toBe(true);
    expect((await getSessionById(exam.id))?.status).toBe("submitted");
    expect(await scanTimedSessions(bot, settings, at("10:32:00"))).toEqual([]);
  });

  it("keeps going when one session fails", async () => {
    const bobId = await upsertUser({ tg_user_id: 43, first_name: "Bob" });
    const bobExam = await createStudySession(bobId, "exam", ["css"], 2, START);
    class FlakyBot extends FakeBotService {
      public override sendMessage(
        chatId: TelegramBot.ChatId,
        text: string,
        options?: TelegramBot.SendMessageOptions
      ): Promise<TelegramBot.Message | undefined> {
        if (chatId === 42) return Promise.reject(new Error("chat unavailable"));
        return super.sendMessage(chatId, text, options);
      }
    }
    const flaky = new FlakyBot();

    expect(await scanTimedSessions(flaky, settings, at("10:31:00"))).toEqual([
      { kind: "submitted", sessionId: bobExam.id, passed: false },
    ]);
    expect(flaky.sent.map((m) => m.chatId)).toEqual([43]);
    expect((await getSessionById(bobExam.id))?.status).toBe("submitted");
  });
});
