import { TOPICS, type Topic } from "./types.js";

const TOPIC_ALIASES: Record<string, Topic> = {
  html: "html",
  html5: "html",
  css: "css",
  css3: "css",
  js: "javascript",
  javascript: "javascript",
  ecmascript: "javascript",
  ts: "typescript",
  typescript: "typescript",
};

export function resolveTopic(raw: string | undefined | null): Topic | null {
  if (!raw) return null;
  return TOPIC_ALIASES[raw.trim().toLowerCase()] ?? null;
}

export function isTopic(value: string): value is Topic {
  return TOPICS.some((t) => t === value);
}

export function topicLabel(topic: Topic): string {
  switch (topic) {
    case "html":
      return "HTML";
    case "css":
      return "CSS";
    case "javascript":
      return "JavaScript";
    case "typescript":
      return "TypeScript";
  }
}
