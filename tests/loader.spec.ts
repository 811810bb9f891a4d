import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { allPairs, loadContentDir, pairsByTopic } from "../src/content/loader.js";
import { lintDocuments } from "../src/lint/linter.js";

const CONTENT_DIR = fileURLToPath(new URL("../content", import.meta.url));

describe("loadContentDir", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "qa-deck-content-"));
    await fs.mkdir(path.join(dir, "extra"));
    await fs.writeFile(path.join(dir, "css.md"), "# CSS\n\n## What is a selector?\n\nA pattern.\n");
    await fs.writeFile(path.join(dir, "extra", "js.md"), "# JS\n\n## What is NaN?\n\nNot a number.\n");
    await fs.writeFile(path.join(dir, "README.md"), "# Read me\n");
    await fs.writeFile(path.join(dir, "notes.txt"), "ignored");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads markdown files recursively, sorted, skipping README", async () => {
    const docs = await loadContentDir(dir);
    expect(docs.map((d) => d.topic)).toEqual(["css", "javascript"]);
    expect(docs.map((d) => path.basename(d.file))).toEqual(["css.md", "js.md"]);
  });

  it("groups pairs by topic", async () => {
    const docs = await loadContentDir(dir);
    expect(allPairs(docs).map((p) => p.id)).toEqual(["css/what-is-a-selector", "javascript/what-is-nan"]);
    const byTopic = pairsByTopic(docs);
    expect([...byTopic.keys()]).toEqual(["css", "javascript"]);
    expect(byTopic.get("css")?.[0].question).toBe("What is a selector?");
  });

  it("fails on a missing directory", async () => {
    await expect(loadContentDir(path.join(dir, "nope"))).rejects.toThrow(
      `Content directory not found: ${path.join(dir, "nope")}`
    );
  });
});

describe("bundled content", () => {
  it("covers every topic and passes lint without errors", async () => {
    const docs = await loadContentDir(CONTENT_DIR);
    expect(docs.map((d) => d.topic)).toEqual(["css", "html", "javascript", "typescript"]);

    const report = lintDocuments(docs);
    expect(report.issues.filter((i) => i.severity === "error")).toEqual([]);
    expect(report.pairsChecked).toBeGreaterThan(40);
  });
});
