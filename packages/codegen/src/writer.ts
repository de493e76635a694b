/**
 * Line-oriented source writer with two-space indentation.
 */
export class CodeWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  /** Append one line at the current indentation; an empty line stays empty. */
  line(text = ""): this {
    this.lines.push(text === "" ? "" : "  ".repeat(this.depth) + text);
    return this;
  }

  /** Append text as is, line breaks included. */
  raw(text: string): this {
    this.lines.push(...text.replace(/\n$/, "").split("\n"));
    return this;
  }

  indent(body: () => void): this {
    this.depth++;
    try {
      body();
    } finally {
      this.depth--;
    }
    return this;
  }

  /** `open`, the indented body, then `close`. */
  block(open: string, body: () => void, close = "}"): this {
    this.line(open);
    this.indent(body);
    return this.line(close);
  }

  /** A JSDoc comment; `*\/` inside the text is escaped. */
  doc(lines: readonly string[]): this {
    this.line("/**");
    for (const text of lines) this.line(` * ${text.replace(/\*\//g, "*\\/")}`.trimEnd());
    return this.line(" */");
  }

  toString(): string {
    return this.lines.join("\n") + "\n";
  }
}
