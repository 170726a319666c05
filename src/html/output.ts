/**
 * Sink that scripts write their document to.
 * Scripts never touch a process stream directly.
 */
export interface OutputWriter {
  /** Append a fragment as-is */
  write(text: string): void;
  /** Append a fragment followed by a newline */
  writeLine(text?: string): void;
}

/**
 * Collects written fragments in memory, in emission order.
 */
export class BufferedOutput implements OutputWriter {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  writeLine(text = ""): void {
    this.parts.push(`${text}\n`);
  }

  /** Fragments written so far */
  get fragments(): readonly string[] {
    return this.parts;
  }

  /** UTF-8 size of the collected document */
  get byteLength(): number {
    return Buffer.byteLength(this.toString(), "utf8");
  }

  toString(): string {
    return this.parts.join("");
  }
}
