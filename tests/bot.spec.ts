import type TelegramBot from "node-telegram-bot-api";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildServices, registerBot } from "../src/bot/bot.js";
import { closeDb, get, initDb, run } from "../src/db/sqlite.js";
import { syncDeckFromContent } from "../src/db/sync-deck.js";
import { RevealProcessor } from "../src/bot/handlers/processors/revealProcessor.js";
import type { BotSettings } from "../src/services/services.js";
import { getActiveSessionForUser, getCardAt, getSessionById, type StudySession } from "../src/services/session.service.js";
import { FakeBotService } from "./helpers/fakeBot.js";
import { sampleDocs } from "./helpers/fixtures.js";

const ADA = 42;
const ADMIN = 7;
const baseSettings: BotSettings = { deckSize: 3, passPercent: 70, cooldownDays: 3, adminIds: [ADMIN] };

function callbackData(options: { reply_markup?: unknown } | undefined): string[][] {
  const markup = options?.reply_markup;
  if (typeof markup !== "object" || markup === null || !("inline_keyboard" in markup)) {
    throw new Error("No inline keyboard");
  }
  const keyboard: unknown = markup.inline_keyboard;
  if (!Array.isArray(keyboard)) throw new Error("Malformed inline keyboard");
  return keyboard.map((row: TelegramBot.InlineKeyboardButton[]) => row.map((b) => b.callback_data ?? ""));
}

async function activeSession(tgUserId: number): Promise<StudySession> {
  const user = await get<{ id: number }>(`SELECT id FROM users WHERE tg_user_id=?`, [tgUserId]);
  const sess = user ? await getActiveSessionForUser(user.id) : undefined;
  if (!sess) throw new Error("No active session");
  return sess;
}

describe("bot", () => {
  let bot: FakeBotService;

  async function setup(settings: BotSettings = baseSettings): Promise<void> {
    bot = new FakeBotService();
    registerBot(buildServices(bot), settings);
  }

  beforeEach(async () => {
    await initDb(":memory:");
    await syncDeckFromContent(sampleDocs());
    await setup();
  });

  afterEach(async () => {
    await closeDb();
  });

  it("greets on /start", async () => {
    await bot.say(ADA, "/start");
    expect(bot.sent).toHaveLength(1);
    expect(bot.sent[0].text.startsWith("Welcome, Ada\\! 👋\n")).toBe(true);
    expect(bot.sent[0].options?.parse_mode).toBe("MarkdownV2");
  });

  it("lists topics", async () => {
    await bot.say(ADA, "/topics");
    expect(bot.lastSent().text).toBe(
      "*Topics*\n• CSS \\(`css`\\): *2* cards\n• HTML \\(`html`\\): *2* cards\n\nStart with /practice \\<topic\\> or /exam"
    );
  });

  it("runs a practice round through the buttons", async () => {
    await bot.say(ADA, "/practice css");
    expect(bot.sent.map((m) => m.text.split("\n")[0])).toEqual([
      "Practice started 📘 \\(untimed\\)\\.",
      "*Card 1/2*  ·  _CSS_  ·  Practice",
    ]);
    const sess = await activeSession(ADA);
    expect(sess).toMatchObject({ mode: "practice", topics: "css", total_count: 2 });
    const card = bot.lastSent();
    expect(callbackData(card.options)).toEqual([
      [`rev:${sess.id}:1`, `ok:${sess.id}:1`, `miss:${sess.id}:1`],
      [`nav:${sess.id}:1`, `next:${sess.id}:1`],
      [`sub:${sess.id}:1`],
    ]);

    await bot.press(ADA, card.messageId, `rev:${sess.id}:1`);
    expect(bot.lastEdit().text).toContain("*Answer*\n");
    expect(bot.lastEdit().text.endsWith("👀 Answer revealed\\. Did you know it?")).toBe(true);
    expect(bot.lastEdit().options?.message_id).toBe(card.messageId);

    await bot.press(ADA, card.messageId, `ok:${sess.id}:1`);
    expect(bot.answers[bot.answers.length - 1].text).toBe("Nice!");
    expect(bot.lastEdit().text.startsWith("*Card 2/2*")).toBe(true);

    await bot.press(ADA, card.messageId, `sub:${sess.id}:2`);
    expect(bot.lastSent().text.startsWith("📘 *Score:* 1/2 \\- *50%*")).toBe(true);
    expect((await getSessionById(sess.id))?.status).toBe("submitted");
    expect(callbackData(bot.lastEdit().options)).toEqual([[`prev:${sess.id}:2`, `nav:${sess.id}:2`]]);
  });

  it("opens the navigator and jumps to a card", async () => {
    await bot.say(ADA, "/practice");
    const sess = await activeSession(ADA);
    const card = bot.lastSent();

    await bot.press(ADA, card.messageId, `nav:${sess.id}:1`);
    expect(bot.markups).toHaveLength(1);
    expect(bot.markups[0].inline_keyboard[0].map((b) => b.callback_data)).toEqual([
      `goto:${sess.id}:1`,
      `goto:${sess.id}:2`,
      `goto:${sess.id}:3`,
    ]);

    await bot.press(ADA, card.messageId, `goto:${sess.id}:3`);
    expect(bot.lastEdit().text.startsWith("*Card 3/3*")).toBe(true);
    expect((await getSessionById(sess.id))?.current_index).toBe(3);
  });

  it("rejects an unknown practice topic", async () => {
    await bot.say(ADA, "/practice rust");
    expect(bot.lastSent().text).toBe('Unknown topic "rust". Try one of: html, css, javascript, typescript.');
  });

  it("resumes instead of opening a second session", async () => {
    await bot.say(ADA, "/practice html");
    bot.reset();
    await bot.say(ADA, "/practice css");
    expect(bot.sent[0].text).toBe("You already have an active session. Showing your current card…");
    expect(bot.sent[1].text).toContain("_HTML_");
  });

  it("keeps exam grading behind a reveal", async () => {
    await bot.say(ADA, "/exam");
    const sess = await activeSession(ADA);
    expect(sess).toMatchObject({ mode: "exam", total_count: 3 });
    expect(bot.sent[0].text.startsWith("Exam started\\!")).toBe(true);

    await bot.press(ADA, bot.lastSent().messageId, `ok:${sess.id}:1`);
    expect(bot.answers[bot.answers.length - 1].text).toBe("Reveal the answer first.");
  });

  it("closes the cards of an exam past its deadline", async () => {
    await bot.say(ADA, "/exam");
    const sess = await activeSession(ADA);
    await run(`UPDATE study_sessions SET expires_at=? WHERE id=?`, ["2000-01-01T00:00:00.000Z", sess.id]);

    await bot.press(ADA, bot.lastSent().messageId, `rev:${sess.id}:1`);
    expect(bot.answers[bot.answers.length - 1].text).toBe("Time is up. Your exam is being submitted.");
    expect((await getCardAt(sess.id, 1))?.revealed).toBe(0);
  });

  it("refuses an exam larger than the deck", async () => {
    await setup({ ...baseSettings, deckSize: 5 });
    await bot.say(ADA, "/exam");
    expect(bot.lastSent().text).toBe("The deck has only 4 card(s); an exam needs 5.");
  });

  it("enforces the cooldown after a failed exam", async () => {
    await bot.say(ADA, "/start");
    await run(`UPDATE users SET last_failed_at=? WHERE tg_user_id=?`, [new Date().toISOString(), ADA]);
    await bot.say(ADA, "/exam");
    expect(bot.lastSent().text.startsWith("⛔ You failed the last exam\\. Next attempt available on *")).toBe(true);
  });

  it("shows progress for the running session", async () => {
    await bot.say(ADA, "/practice css");
    const sess = await activeSession(ADA);
    await bot.press(ADA, bot.lastSent().messageId, `rev:${sess.id}:1`);
    bot.reset();

    await bot.say(ADA, "/progress");
    expect(bot.sent[0].text).toBe(
      "*Progress*\n👀 Seen: *1*/2\n✅ Known: *0*\n📌 Missed: *0*\n◯ Left: *2*"
    );
    expect(bot.sent[1].text.startsWith("*Card 1/2*")).toBe(true);
  });

  it("submits and quits from commands", async () => {
    await bot.say(ADA, "/quit");
    expect(bot.lastSent().text).toBe("No active session. Use /practice or /exam.");

    await bot.say(ADA, "/practice css");
    await bot.say(ADA, "/quit");
    expect(bot.lastSent().text).toBe(
      "Session dropped. It won't count towards anything. /practice to start over."
    );

    await bot.say(ADA, "/practice css");
    bot.reset();
    await bot.say(ADA, "/submit");
    expect(bot.sent[0].text.startsWith("📘 *Score:* 0/2 \\- *0%*")).toBe(true);
    expect(bot.sent[1].text.startsWith("*Card 1/2*")).toBe(true);
  });

  it("limits admin commands to admins", async () => {
    await bot.say(ADA, "/health");
    expect(bot.lastSent().text).toBe("Admins only.");

    await bot.say(ADMIN, "/health");
    expect(bot.lastSent().text).toBe(
      "*Health*\ntopics: CSS=*2*, HTML=*2*\nactive cards: *4*\ndeck size: *3*, pass: *70%*"
    );

    await bot.say(ADMIN, "/admin_stats 7d");
    expect(bot.lastSent().text.startsWith("*Admin stats* \\(7d\\)\n")).toBe(true);
  });
});

describe("callback parsing", () => {
  const processor = new RevealProcessor(new FakeBotService(), baseSettings);

  it("accepts its own actions", () => {
    expect(processor.parse("rev:abc_D-1:2")).toMatchObject({ action: "rev", sessionId: "abc_D-1", index: 2 });
  });

  it("rejects other actions and malformed payloads", () => {
    expect(processor.parse("ok:abc:2")).toBeNull();
    expect(processor.parse("rev:abc:0")).toBeNull();
    expect(processor.parse("rev:abc")).toBeNull();
    expect(processor.parse("garbage")).toBeNull();
  });
});
