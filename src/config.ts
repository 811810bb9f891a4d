import "dotenv/config";
import { z } from "zod";
import { DEFAULT_DECK_SIZE } from "./domain/policy.js";

const Env = z.object({
  BOT_TOKEN: z.string().min(10, "BOT_TOKEN is too short").optional(),
  DB_FILE: z.string().default("./data/qa-deck.sqlite"),
  CONTENT_DIR: z.string().default("./content"),
  SITE_DIR: z.string().default("./site"),
  LINT_CONFIG: z.string().default("./qa-deck.lint.json"),
  DECK_SIZE: z.coerce.number().int().min(1).max(100).default(DEFAULT_DECK_SIZE),
  ADMIN_IDS: z.string().default(""),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
  LOG_DIR: z.string().default("./logs"),
  TZ: z.string().optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export const config: AppConfig = Env.parse(process.env);

export function requireBotToken(cfg: AppConfig = config): string {
  if (!cfg.BOT_TOKEN) {
    throw new Error("BOT_TOKEN is required to run the bot");
  }
  return cfg.BOT_TOKEN;
}
