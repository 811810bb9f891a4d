import { config } from "../config.js";
import { loadContentDir } from "../content/loader.js";
import { logger } from "../logger.js";
import { buildSite } from "../render/site.js";

// Usage: npm run build:site [contentDir] [outDir]
async function main(): Promise<void> {
  const contentDir = process.argv[2] ?? config.CONTENT_DIR;
  const outDir = process.argv[3] ?? config.SITE_DIR;
  const docs = await loadContentDir(contentDir);
  const files = await buildSite(docs, outDir);
  for (const file of files) process.stdout.write(`${file}\n`);
}

main().catch((e: unknown) => {
  logger.error("build-site failed", {
    error: e instanceof Error ? e.message : String(e),
    stack: e instanceof Error ? e.stack : undefined,
  });
  process.exit(1);
});
