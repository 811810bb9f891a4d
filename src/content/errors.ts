/**
 * Raised when a Markdown document cannot be turned into a deck document,
 * e.g. its topic cannot be determined.
 */
export class ContentError extends Error {
  public readonly file: string;
  public readonly line: number | null;

  public constructor(message: string, file: string, line: number | null = null) {
    super(line === null ? `${file}: ${message}` : `${file}:${line}: ${message}`);
    this.name = "ContentError";
    this.file = file;
    this.line = line;
  }
}
