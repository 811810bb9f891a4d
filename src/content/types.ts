/**
 * Types for interview Q&A documents.
 *
 * A document is one Markdown file per topic. Each question heading plus
 * the prose and code under it forms a Q&A pair, the deck's only content unit.
 */

export type Topic = "html" | "css" | "javascript" | "typescript";

export const TOPICS: readonly Topic[] = [
  "html",
  "css",
  "javascript",
  "typescript",
] as const;

/**
 * Fenced code block (``` or ~~~)
 */
export interface CodeBlock {
  /** First word of the info string, lowercased */
  language: string | null;

  /** Rest of the info string after the language */
  meta: string | null;

  code: string;

  /** Line of the opening fence (1-indexed) */
  line: number;

  /** False when the fence runs to end of file */
  closed: boolean;
}

/**
 * ATX heading
 */
export interface Heading {
  level: number;
  text: string;
  slug: string;
  line: number;
}

export interface QaPair {
  /** `<topic>/<slug>`, unique within a document */
  id: string;

  /** Anchor of the question heading */
  slug: string;
  topic: Topic;
  question: string;
  level: number;

  /** Markdown under the question heading, trimmed */
  answer: string;

  codeBlocks: CodeBlock[];

  /** Line of the question heading (1-indexed) */
  line: number;

  /** Content hash of question + answer, used to detect edits */
  hash: string;
}

export interface FrontMatter {
  data: Record<string, string>;

  /** Index of the first body line (0-indexed) */
  bodyStart: number;
}

export interface ContentDocument {
  file: string;
  topic: Topic;
  title: string;

  /** True when the title came from a `#` heading */
  hasTitleHeading: boolean;

  hash: string;
  frontMatter: Record<string, string>;
  headings: Heading[];
  pairs: QaPair[];
  codeBlocks: CodeBlock[];
}
