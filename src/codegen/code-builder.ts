/**
 * CodeBuilder - string builder with indentation support.
 *
 * The C printer writes through this so nested blocks indent themselves.
 */

export class CodeBuilder {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private readonly indentStr: string;
  private atLineStart: boolean = true;

  constructor(indentStr: string = "  ") {
    this.indentStr = indentStr;
  }

  /**
   * Add content, indenting it when it starts a line.
   */
  write(content: string): this {
    if (content.length === 0) return this;

    const lines = content.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (i > 0) {
        this.newline();
      }
      if (line.length > 0) {
        if (this.atLineStart) {
          this.parts.push(this.indentStr.repeat(this.indentLevel));
          this.atLineStart = false;
        }
        this.parts.push(line);
      }
    }
    return this;
  }

  newline(): this {
    this.parts.push("\n");
    this.atLineStart = true;
    return this;
  }

  /**
   * Add content followed by a newline.
   */
  writeLine(content: string = ""): this {
    this.write(content);
    return this.newline();
  }

  /**
   * Write `header {`, run `body` one level deeper, then close the brace.
   */
  block(header: string, body: () => void): this {
    this.writeLine(`${header} {`);
    this.indent();
    body();
    this.dedent();
    return this.writeLine("}");
  }

  indent(): this {
    this.indentLevel++;
    return this;
  }

  dedent(): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this;
  }

  getIndentLevel(): number {
    return this.indentLevel;
  }

  build(): string {
    return this.parts.join("");
  }
}
