import fs from "node:fs/promises";
import path from "node:path";
import type { ContentDocument } from "../content/types.js";
import { logger } from "../logger.js";
import { groupByTopic, pageFileName, renderIndexPage, renderTopicPage } from "./pages.js";

/**
 * Write `index.html` plus one page per topic into `outDir`.
 * @returns absolute paths of the written files, index first
 */
export async function buildSite(
  docs: ContentDocument[],
  outDir: string
): Promise<string[]> {
  const root = path.resolve(outDir);
  await fs.mkdir(root, { recursive: true });

  const written: string[] = [];
  const indexPath = path.join(root, "index.html");
  await fs.writeFile(indexPath, renderIndexPage(docs), "utf8");
  written.push(indexPath);

  for (const page of groupByTopic(docs)) {
    const file = path.join(root, pageFileName(page.topic));
    await fs.writeFile(file, renderTopicPage(page), "utf8");
    written.push(file);
  }

  logger.info(`Site written to ${root} (${written.length} page(s))`);
  return written;
}
