/**
 * Markdown document parser
 *
 * Line-based: finds front matter, ATX headings and fenced code blocks,
 * then cuts the document into Q&A pairs. Anything inside a fence is code,
 * never a heading. Fences may be indented any amount so that fences nested
 * in list items are recognised; a 4-space indented code block that starts
 * with a fence marker is read as a fence as well.
 */

import { createHash } from "node:crypto";
import path from "node:path";
import { ContentError } from "./errors.js";
import { resolveTopic } from "./topics.js";
import type {
  CodeBlock,
  ContentDocument,
  FrontMatter,
  Heading,
  QaPair,
  Topic,
} from "./types.js";

const HEADING_RE = /^ {0,3}(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_OPEN_RE = /^( *)(`{3,}|~{3,})[ \t]*(.*)$/;
const FENCE_CLOSE_RE = /^ *(`{3,}|~{3,})[ \t]*$/;

interface RawHeading {
  level: number;
  text: string;
  index: number;
}

interface RawBlock {
  block: CodeBlock;
  index: number;
}

/**
 * Parse `---` delimited front matter made of `key: value` lines.
 * Returns an empty map and bodyStart 0 when there is none.
 */
export function parseFrontMatter(lines: string[]): FrontMatter {
  if (lines.length === 0 || lines[0].trim() !== "---") {
    return { data: {}, bodyStart: 0 };
  }
  const endIdx = lines.findIndex((l, i) => i > 0 && l.trim() === "---");
  if (endIdx === -1) return { data: {}, bodyStart: 0 };

  const data: Record<string, string> = {};
  for (const line of lines.slice(1, endIdx)) {
    const match = /^([\w-]+):\s*(.*)$/.exec(line);
    if (!match) continue;
    data[match[1]] = match[2].trim().replace(/^["']|["']$/g, "");
  }
  return { data, bodyStart: endIdx + 1 };
}

/**
 * GitHub-style anchor slug
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/\s/g, "-");
}

function uniqueSlugger(): (text: string) => string {
  const seen = new Set<string>();
  return (text) => {
    const base = slugify(text) || "section";
    let slug = base;
    for (let n = 1; seen.has(slug); n++) {
      slug = `${base}-${n}`;
    }
    seen.add(slug);
    return slug;
  };
}

// strips at most `indent` leading spaces, as for lines of an indented fence
function dedent(line: string, indent: number): string {
  let cut = 0;
  while (cut < indent && line[cut] === " ") cut++;
  return line.slice(cut);
}

function shortHash(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 16);
}

function splitInfo(info: string): { language: string | null; meta: string | null } {
  const trimmed = info.trim();
  if (!trimmed) return { language: null, meta: null };
  const [lang, ...rest] = trimmed.split(/\s+/);
  const meta = rest.join(" ");
  return { language: lang.toLowerCase(), meta: meta || null };
}

function scan(
  lines: string[],
  start: number
): { headings: RawHeading[]; blocks: RawBlock[] } {
  const headings: RawHeading[] = [];
  const blocks: RawBlock[] = [];

  let fence: {
    char: string;
    length: number;
    indent: number;
    index: number;
    info: string;
    body: string[];
  } | null = null;

  for (let i = start; i < lines.length; i++) {
    const line = lines[i];

    if (fence) {
      const close = FENCE_CLOSE_RE.exec(line);
      if (
        close &&
        close[1][0] === fence.char &&
        close[1].length >= fence.length
      ) {
        blocks.push({
          index: fence.index,
          block: {
            ...splitInfo(fence.info),
            code: fence.body.join("\n"),
            line: fence.index + 1,
            closed: true,
          },
        });
        fence = null;
      } else {
        fence.body.push(dedent(line, fence.indent));
      }
      continue;
    }

    const open = FENCE_OPEN_RE.exec(line);
    // a backtick fence's info string may not contain backticks
    if (open && !(open[2][0] === "`" && open[3].includes("`"))) {
      fence = {
        char: open[2][0],
        length: open[2].length,
        indent: open[1].length,
        index: i,
        info: open[3],
        body: [],
      };
      continue;
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      headings.push({ level: heading[1].length, text: heading[2].trim(), index: i });
    }
  }

  if (fence) {
    blocks.push({
      index: fence.index,
      block: {
        ...splitInfo(fence.info),
        code: fence.body.join("\n"),
        line: fence.index + 1,
        closed: false,
      },
    });
  }

  return { headings, blocks };
}

function detectTopic(file: string, frontMatter: Record<string, string>): Topic {
  if (frontMatter.topic !== undefined) {
    const fromFm = resolveTopic(frontMatter.topic);
    if (!fromFm) {
      throw new ContentError(`unknown topic '${frontMatter.topic}'`, file, 1);
    }
    return fromFm;
  }
  const base = path.basename(file).replace(/\.(md|markdown)$/i, "");
  const fromName = resolveTopic(base);
  if (!fromName) {
    throw new ContentError(
      "cannot determine topic: add 'topic:' front matter or name the file after the topic",
      file
    );
  }
  return fromName;
}

export function parseMarkdownDocument(file: string, text: string): ContentDocument {
  const normalized = text.replace(/\r\n?/g, "\n");
  const lines = normalized.split("\n");
  const fm = parseFrontMatter(lines);
  const topic = detectTopic(file, fm.data);

  const { headings: raw, blocks } = scan(lines, fm.bodyStart);
  const slugFor = uniqueSlugger();
  const headings: Heading[] = raw.map((h) => ({
    level: h.level,
    text: h.text,
    slug: slugFor(h.text),
    line: h.index + 1,
  }));

  const pairs: QaPair[] = [];
  // ancestors of the current heading; a heading inside a question's answer is not a question
  const stack: Array<{ level: number; isQuestion: boolean }> = [];

  for (let k = 0; k < raw.length; k++) {
    const h = raw[k];
    const next = raw[k + 1];

    while (stack.length > 0 && stack[stack.length - 1].level >= h.level) {
      stack.pop();
    }
    const insideAnswer = stack.some((s) => s.isQuestion);

    const ownEnd = next ? next.index : lines.length;
    const ownBody = lines.slice(h.index + 1, ownEnd).join("\n").trim();
    const isGroup = ownBody === "" && next !== undefined && next.level > h.level;
    const isQuestion = h.level >= 2 && !insideAnswer && !isGroup;

    stack.push({ level: h.level, isQuestion });
    if (!isQuestion) continue;

    let end = lines.length;
    for (let j = k + 1; j < raw.length; j++) {
      if (raw[j].level <= h.level) {
        end = raw[j].index;
        break;
      }
    }

    const answer = lines.slice(h.index + 1, end).join("\n").trim();
    const slug = headings[k].slug;
    pairs.push({
      id: `${topic}/${slug}`,
      slug,
      topic,
      question: h.text,
      level: h.level,
      answer,
      codeBlocks: blocks
        .filter((b) => b.index > h.index && b.index < end)
        .map((b) => b.block),
      line: h.index + 1,
      hash: shortHash(`${h.text}\n${answer}`),
    });
  }

  const titleHeading = headings.find((h) => h.level === 1);
  const title =
    fm.data.title ??
    titleHeading?.text ??
    path.basename(file).replace(/\.(md|markdown)$/i, "");

  return {
    file,
    topic,
    title,
    hasTitleHeading: titleHeading !== undefined,
    hash: shortHash(normalized),
    frontMatter: fm.data,
    headings,
    pairs,
    codeBlocks: blocks.map((b) => b.block),
  };
}
