import { topicLabel } from "../content/topics.js";
import type { ContentDocument, QaPair, Topic } from "../content/types.js";
import { escapeHtml, renderInline, renderMarkdown } from "./markdown.js";

const STYLE = `body{font-family:system-ui,sans-serif;max-width:48rem;margin:0 auto;padding:1rem;line-height:1.5}
header{margin-bottom:1.5rem}
article{border-top:1px solid #ddd;padding-top:.5rem}
pre{background:#f6f8fa;padding:.75rem;overflow-x:auto}
code{font-family:ui-monospace,monospace}
.count{color:#666}`;

/** Every pair of one topic, gathered from all documents that carry it */
export interface TopicPage {
  topic: Topic;
  title: string;
  entries: Array<{ pair: QaPair; anchor: string }>;
}

export function pageFileName(topic: Topic): string {
  return `${topic}.html`;
}

/**
 * Merge documents by topic, in order of first appearance. The first document
 * names the page; a slug repeated by a later document gets a numeric suffix.
 */
export function groupByTopic(docs: readonly ContentDocument[]): TopicPage[] {
  const pages = new Map<Topic, { page: TopicPage; anchors: Set<string> }>();
  for (const doc of docs) {
    let slot = pages.get(doc.topic);
    if (!slot) {
      slot = { page: { topic: doc.topic, title: doc.title, entries: [] }, anchors: new Set() };
      pages.set(doc.topic, slot);
    }
    for (const pair of doc.pairs) {
      let anchor = pair.slug;
      for (let n = 1; slot.anchors.has(anchor); n++) anchor = `${pair.slug}-${n}`;
      slot.anchors.add(anchor);
      slot.page.entries.push({ pair, anchor });
    }
  }
  return [...pages.values()].map((s) => s.page);
}

export function layout(title: string, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLE}</style>`,
    "</head>",
    "<body>",
    '<header><a href="index.html">All topics</a></header>',
    "<main>",
    body,
    "</main>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

function renderPair({ pair, anchor }: { pair: QaPair; anchor: string }): string {
  const slug = escapeHtml(anchor);
  return [
    `<article id="${slug}">`,
    `<h2><a href="#${slug}">${renderInline(pair.question)}</a></h2>`,
    `<div class="answer">${renderMarkdown(pair.answer)}</div>`,
    "</article>",
  ].join("\n");
}

export function renderTopicPage(page: TopicPage): string {
  const toc = page.entries
    .map((e) => `<li><a href="#${escapeHtml(e.anchor)}">${renderInline(e.pair.question)}</a></li>`)
    .join("\n");
  const body = [
    `<h1>${escapeHtml(page.title)}</h1>`,
    `<nav class="toc"><ol>\n${toc}\n</ol></nav>`,
    ...page.entries.map(renderPair),
  ].join("\n");
  return layout(page.title, body);
}

export function renderIndexPage(docs: readonly ContentDocument[], title = "Interview questions"): string {
  const items = groupByTopic(docs)
    .map(
      (p) =>
        `<li><a href="${pageFileName(p.topic)}">${escapeHtml(topicLabel(p.topic))}</a> <span class="count">(${p.entries.length})</span></li>`
    )
    .join("\n");
  return layout(title, `<h1>${escapeHtml(title)}</h1>\n<ul>\n${items}\n</ul>`);
}
