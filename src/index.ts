import { config, requireBotToken } from "./config.js";
import { logger } from "./logger.js";
import { closeDb, initDb } from "./db/sqlite.js";
import { syncDeckFromContent } from "./db/sync-deck.js";
import { loadContentDir } from "./content/loader.js";
import { formatSummary, lintDocuments, loadLintConfig } from "./lint/index.js";
import { createBot } from "./bot/bot.js";
import { startScheduler } from "./cron/scheduler.js";
import { FAILED_COOLDOWN_DAYS, PASS_PERCENT } from "./domain/policy.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";
import { parseAdminIds } from "./security/admin.js";
import type { BotSettings } from "./services/services.js";

async function main(): Promise<void> {
  const token = requireBotToken(config);
  await initDb(config.DB_FILE);

  const docs = await loadContentDir(config.CONTENT_DIR);
  const report = lintDocuments(docs, loadLintConfig(config.LINT_CONFIG));
  const summary = formatSummary(report);
  if (report.errorCount > 0) {
    logger.warn(`Content lint: ${summary}. Run npm run lint:content for details.`);
  } else {
    logger.info(`Content lint: ${summary}`);
  }

  const stats = await syncDeckFromContent(docs);
  logger.info(
    `Deck sync: scanned=${stats.scanned}, inserted=${stats.inserted}, updated=${stats.updated}, deactivated=${stats.deactivated}, skipped=${stats.skipped}`
  );

  const settings: BotSettings = {
    deckSize: config.DECK_SIZE,
    passPercent: PASS_PERCENT,
    cooldownDays: FAILED_COOLDOWN_DAYS,
    adminIds: parseAdminIds(config.ADMIN_IDS),
  };

  const { bot, services } = await createBot(token, settings);
  const task = startScheduler(services.botService, settings);

  installGlobalErrorHandlers(async () => {
    task.stop();
    await bot.stopPolling();
    await closeDb();
  });

  bot.on("polling_error", (err) => logger.error("Telegram polling error", { err: err.message }));
  bot.on("error", (err) => logger.error("Telegram error", { err: err.message }));

  logger.info("Bot started. Use /practice or /exam.");
}

main().catch((e: unknown) => {
  logger.error("Fatal error during startup", {
    error: e instanceof Error ? e.message : String(e),
    stack: e instanceof Error ? e.stack : undefined,
  });
  process.exit(1);
});
