import { parseMarkdownDocument } from "../../src/content/markdown.js";
import type { ContentDocument } from "../../src/content/types.js";

export const HTML_DOC = `# HTML

## What is a void element?

An element with no closing tag, such as \`<br>\`.

## What does the lang attribute do?

It declares the language of the page.
`;

export const CSS_DOC = `# CSS

## What is specificity?

The weight that decides which rule wins.

## What does box-sizing do?

It decides whether padding counts towards width.

\`\`\`css
.a {
  box-sizing: border-box;
}
\`\`\`
`;

export function sampleDocs(): ContentDocument[] {
  return [
    parseMarkdownDocument("content/css.md", CSS_DOC),
    parseMarkdownDocument("content/html.md", HTML_DOC),
  ];
}
