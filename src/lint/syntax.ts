import ts from "typescript";
import type { SyntaxProblem } from "./types.js";

const SCRIPT_FILES: Record<string, string> = {
  js: "snippet.js",
  javascript: "snippet.js",
  mjs: "snippet.mjs",
  cjs: "snippet.cjs",
  jsx: "snippet.jsx",
  ts: "snippet.ts",
  typescript: "snippet.ts",
  tsx: "snippet.tsx",
};

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input",
  "link", "meta", "source", "track", "wbr",
]);

// end tag may be omitted in HTML
const OPTIONAL_END = new Set([
  "html", "head", "body", "p", "li", "dt", "dd", "tr", "td", "th",
  "thead", "tbody", "tfoot", "colgroup", "option", "optgroup", "rt", "rp",
]);

const RAW_TEXT = new Set(["script", "style", "textarea", "title"]);

export type Checker = (code: string) => SyntaxProblem[];

function lineAt(code: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < code.length; i++) {
    if (code[i] === "\n") line++;
  }
  return line;
}

function scriptChecker(fileName: string): Checker {
  return (code) => {
    const out = ts.transpileModule(code, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: {
        allowJs: true,
        target: ts.ScriptTarget.ES2022,
        jsx: ts.JsxEmit.Preserve,
      },
    });
    return (out.diagnostics ?? []).map((d) => ({
      line:
        d.file && d.start !== undefined
          ? d.file.getLineAndCharacterOfPosition(d.start).line + 1
          : 1,
      message: ts.flattenDiagnosticMessageText(d.messageText, " "),
    }));
  };
}

export function checkJson(code: string): SyntaxProblem[] {
  try {
    JSON.parse(code);
    return [];
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const pos = /position (\d+)/.exec(message);
    return [{ line: pos ? lineAt(code, Number(pos[1])) : 1, message }];
  }
}

const CLOSERS: Record<string, string> = { "}": "{", ")": "(", "]": "[" };

/**
 * Structural CSS check: brackets balanced, strings and comments closed.
 */
export function checkCss(code: string, lineComments = false): SyntaxProblem[] {
  const stack: Array<{ ch: string; line: number }> = [];
  let line = 1;

  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (ch === "\n") {
      line++;
      continue;
    }
    if (ch === "/" && code[i + 1] === "*") {
      const end = code.indexOf("*/", i + 2);
      if (end === -1) return [{ line, message: "Unterminated comment" }];
      line += lineAt(code.slice(i, end), end - i) - 1;
      i = end + 1;
      continue;
    }
    if (lineComments && ch === "/" && code[i + 1] === "/") {
      const end = code.indexOf("\n", i);
      i = (end === -1 ? code.length : end) - 1;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const start = line;
      let j = i + 1;
      while (j < code.length && code[j] !== ch && code[j] !== "\n") {
        if (code[j] === "\\") j++;
        j++;
      }
      if (j >= code.length || code[j] !== ch) {
        return [{ line: start, message: "Unterminated string" }];
      }
      i = j;
      continue;
    }
    if (ch === "{" || ch === "(" || ch === "[") {
      stack.push({ ch, line });
    } else if (ch in CLOSERS) {
      const top = stack.pop();
      if (!top) return [{ line, message: `Unexpected '${ch}'` }];
      if (top.ch !== CLOSERS[ch]) {
        return [
          { line, message: `Expected closer for '${top.ch}' opened on line ${top.line}, found '${ch}'` },
        ];
      }
    }
  }

  return stack.map((s) => ({ line: s.line, message: `Unclosed '${s.ch}'` }));
}

const TAG_RE = /<!--|<!\[CDATA\[|<![^>]*>|<\/([a-zA-Z][\w-]*)\s*>|<([a-zA-Z][\w-]*)((?:[^>"']|"[^"]*"|'[^']*')*)>/g;

/**
 * Tag-balance HTML check: non-void elements close in order.
 * Elements whose end tag HTML allows omitting are closed implicitly.
 */
export function checkHtml(code: string): SyntaxProblem[] {
  const stack: Array<{ name: string; line: number }> = [];
  const problems: SyntaxProblem[] = [];
  TAG_RE.lastIndex = 0;

  let m: RegExpExecArray | null;
  while ((m = TAG_RE.exec(code)) !== null) {
    const at = m.index;
    if (m[0] === "<!--") {
      const end = code.indexOf("-->", at + 4);
      if (end === -1) {
        problems.push({ line: lineAt(code, at), message: "Unterminated comment" });
        break;
      }
      TAG_RE.lastIndex = end + 3;
      continue;
    }
    if (m[0] === "<![CDATA[") {
      const end = code.indexOf("]]>", at);
      TAG_RE.lastIndex = end === -1 ? code.length : end + 3;
      continue;
    }
    if (m[1] !== undefined) {
      const name = m[1].toLowerCase();
      while (
        stack.length > 0 &&
        stack[stack.length - 1].name !== name &&
        OPTIONAL_END.has(stack[stack.length - 1].name)
      ) {
        stack.pop();
      }
      const top = stack[stack.length - 1];
      if (top && top.name === name) {
        stack.pop();
      } else if (!VOID_ELEMENTS.has(name)) {
        problems.push({
          line: lineAt(code, at),
          message: top
            ? `Unexpected </${name}>, expected </${top.name}>`
            : `Unexpected </${name}>`,
        });
      }
      continue;
    }
    if (m[2] !== undefined) {
      const name = m[2].toLowerCase();
      const selfClosing = m[3].trimEnd().endsWith("/");
      if (VOID_ELEMENTS.has(name) || selfClosing) continue;
      if (RAW_TEXT.has(name)) {
        const close = new RegExp(`</${name}\\s*>`, "i");
        const rest = code.slice(TAG_RE.lastIndex);
        const found = close.exec(rest);
        if (!found) {
          problems.push({ line: lineAt(code, at), message: `Unclosed <${name}>` });
          break;
        }
        TAG_RE.lastIndex += found.index + found[0].length;
        continue;
      }
      stack.push({ name, line: lineAt(code, at) });
    }
  }

  for (const open of stack) {
    if (!OPTIONAL_END.has(open.name)) {
      problems.push({ line: open.line, message: `Unclosed <${open.name}>` });
    }
  }
  return problems;
}

/**
 * Checker for a fence language, or null when the language is not checked.
 */
export function checkerFor(language: string | null): Checker | null {
  if (!language) return null;
  const script = SCRIPT_FILES[language];
  if (script) return scriptChecker(script);
  switch (language) {
    case "json":
      return checkJson;
    case "css":
      return (code) => checkCss(code);
    case "scss":
      return (code) => checkCss(code, true);
    case "html":
    case "xhtml":
      return checkHtml;
    default:
      return null;
  }
}
