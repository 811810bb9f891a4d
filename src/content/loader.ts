import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger.js";
import { parseMarkdownDocument } from "./markdown.js";
import type { ContentDocument, QaPair, Topic } from "./types.js";

const SKIPPED_FILES = new Set(["readme.md", "changelog.md"]);

async function listMarkdownFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const out: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      out.push(...(await listMarkdownFiles(full)));
    } else if (
      entry.isFile() &&
      /\.(md|markdown)$/i.test(entry.name) &&
      !SKIPPED_FILES.has(entry.name.toLowerCase())
    ) {
      out.push(full);
    }
  }
  return out;
}

/**
 * Load every Markdown document under `dir`, sorted by path.
 */
export async function loadContentDir(dir: string): Promise<ContentDocument[]> {
  const root = path.resolve(dir);
  const stat = await fs.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new Error(`Content directory not found: ${root}`);
  }

  const files = (await listMarkdownFiles(root)).sort();
  const docs: ContentDocument[] = [];
  for (const file of files) {
    const text = await fs.readFile(file, "utf8");
    const rel = path.relative(process.cwd(), file) || file;
    docs.push(parseMarkdownDocument(rel, text));
  }

  logger.debug(`Loaded ${docs.length} document(s) from ${root}`);
  return docs;
}

export function allPairs(docs: ContentDocument[]): QaPair[] {
  return docs.flatMap((d) => d.pairs);
}

export function pairsByTopic(docs: ContentDocument[]): Map<Topic, QaPair[]> {
  const out = new Map<Topic, QaPair[]>();
  for (const pair of allPairs(docs)) {
    const list = out.get(pair.topic) ?? [];
    list.push(pair);
    out.set(pair.topic, list);
  }
  return out;
}
