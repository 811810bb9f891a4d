import { config } from "../config.js";
import { loadContentDir } from "../content/loader.js";
import { ContentError } from "../content/errors.js";
import { formatIssue, formatSummary, lintDocuments, loadLintConfig } from "../lint/index.js";
import { logger } from "../logger.js";

// Usage: npm run lint:content [contentDir]
async function main(): Promise<number> {
  const dir = process.argv[2] ?? config.CONTENT_DIR;
  const docs = await loadContentDir(dir);
  const report = lintDocuments(docs, loadLintConfig(config.LINT_CONFIG));

  for (const issue of report.issues) {
    process.stdout.write(`${formatIssue(issue)}\n`);
  }
  process.stdout.write(`${formatSummary(report)}\n`);
  return report.errorCount > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    if (e instanceof ContentError) {
      process.stderr.write(`error ${e.message}\n`);
    } else {
      logger.error("lint-content failed", { error: e instanceof Error ? e.message : String(e) });
    }
    process.exit(2);
  });
