import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LintOptions } from "./types.js";

const Setting = z.enum(["off", "error", "warning"]);

const LintConfigSchema = z.object({
  rules: z
    .object({
      "answer-missing": Setting,
      "code-syntax": Setting,
      "unclosed-fence": Setting,
      "code-language": Setting,
      "duplicate-question": Setting,
      "heading-increment": Setting,
      "document-title": Setting,
    })
    .partial()
    .strict()
    .default({}),
});

export function parseLintConfig(raw: unknown): LintOptions {
  return LintConfigSchema.parse(raw);
}

/**
 * Read lint options from a JSON file; a missing file means defaults.
 */
export function loadLintConfig(filePath: string): LintOptions {
  const full = path.resolve(filePath);
  if (!fs.existsSync(full)) return {};
  const parsed: unknown = JSON.parse(fs.readFileSync(full, "utf8"));
  return parseLintConfig(parsed);
}
