import type { ContentDocument } from "../content/types.js";
import { checkerFor } from "./syntax.js";
import type { LintRule, RuleFinding } from "./types.js";

const NO_CHECK_RE = /(^|\s)no-check(\s|$)/;

function normalizeQuestion(text: string): string {
  return text.toLowerCase().replace(/[`*_]/g, "").replace(/\s+/g, " ").trim();
}

export const answerMissing: LintRule = {
  id: "answer-missing",
  defaultSeverity: "error",
  description: "Every question heading has an answer under it",
  check: (doc) =>
    doc.pairs
      .filter((p) => p.answer === "")
      .map((p) => ({ line: p.line, message: `Question "${p.question}" has no answer` })),
};

export const codeSyntax: LintRule = {
  id: "code-syntax",
  defaultSeverity: "error",
  description: "Fenced code parses in its stated language",
  check: (doc) => {
    const findings: RuleFinding[] = [];
    for (const block of doc.codeBlocks) {
      if (!block.closed) continue;
      if (block.meta && NO_CHECK_RE.test(block.meta)) continue;
      const checker = checkerFor(block.language);
      if (!checker) continue;
      for (const problem of checker(block.code)) {
        findings.push({
          line: block.line + problem.line,
          message: `${block.language ?? ""}: ${problem.message}`,
        });
      }
    }
    return findings;
  },
};

export const unclosedFence: LintRule = {
  id: "unclosed-fence",
  defaultSeverity: "error",
  description: "Every code fence is closed",
  check: (doc) =>
    doc.codeBlocks
      .filter((b) => !b.closed)
      .map((b) => ({ line: b.line, message: "Code fence is never closed" })),
};

export const codeLanguage: LintRule = {
  id: "code-language",
  defaultSeverity: "warning",
  description: "Every code fence names its language",
  check: (doc) =>
    doc.codeBlocks
      .filter((b) => b.language === null)
      .map((b) => ({ line: b.line, message: "Code fence has no language" })),
};

export const duplicateQuestion: LintRule = {
  id: "duplicate-question",
  defaultSeverity: "warning",
  description: "A question appears once per document",
  check: (doc) => {
    const seen = new Map<string, number>();
    const findings: RuleFinding[] = [];
    for (const pair of doc.pairs) {
      const key = normalizeQuestion(pair.question);
      const first = seen.get(key);
      if (first === undefined) {
        seen.set(key, pair.line);
      } else {
        findings.push({
          line: pair.line,
          message: `Question "${pair.question}" duplicates line ${first}`,
        });
      }
    }
    return findings;
  },
};

export const headingIncrement: LintRule = {
  id: "heading-increment",
  defaultSeverity: "warning",
  description: "Heading levels go down one at a time",
  check: (doc) => {
    const findings: RuleFinding[] = [];
    for (let i = 1; i < doc.headings.length; i++) {
      const prev = doc.headings[i - 1];
      const cur = doc.headings[i];
      if (cur.level > prev.level + 1) {
        findings.push({
          line: cur.line,
          message: `Heading level ${cur.level} follows level ${prev.level}`,
        });
      }
    }
    return findings;
  },
};

export const documentTitle: LintRule = {
  id: "document-title",
  defaultSeverity: "warning",
  description: "Each document starts with a # title",
  check: (doc: ContentDocument) =>
    doc.hasTitleHeading ? [] : [{ line: 1, message: "Document has no # title" }],
};

export const ALL_RULES: readonly LintRule[] = [
  answerMissing,
  codeSyntax,
  unclosedFence,
  codeLanguage,
  duplicateQuestion,
  headingIncrement,
  documentTitle,
];
