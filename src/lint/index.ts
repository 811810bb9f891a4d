export * from "./types.js";
export { ALL_RULES } from "./rules.js";
export { lintDocument, lintDocuments, formatIssue, formatSummary } from "./linter.js";
export { loadLintConfig, parseLintConfig } from "./config.js";
export { checkerFor, checkCss, checkHtml, checkJson } from "./syntax.js";
