const NEWLINE = 0x0a;

/**
 * Splits a byte stream into text lines. Bytes are held until a newline
 * completes the line, so a multi-byte character split across chunks still
 * decodes; invalid sequences decode to U+FFFD.
 */
export class LineDecoder {
  #pending = Buffer.alloc(0);

  // returns the lines completed by this chunk, in the order they arrived
  push(chunk: Buffer): string[] {
    let data = this.#pending.length ? Buffer.concat([this.#pending, chunk]) : chunk;
    const lines: string[] = [];
    let end = data.indexOf(NEWLINE);
    while (end !== -1) {
      const line = LineDecoder.decode(data.subarray(0, end));
      if (line) lines.push(line);
      data = data.subarray(end + 1);
      end = data.indexOf(NEWLINE);
    }
    this.#pending = Buffer.from(data);
    return lines;
  }

  // whatever is left once the stream ends, null if nothing printable
  flush(): string | null {
    const line = LineDecoder.decode(this.#pending);
    this.#pending = Buffer.alloc(0);
    return line || null;
  }

  get pending(): number {
    return this.#pending.length;
  }

  static decode(bytes: Buffer): string {
    return bytes.toString('utf8').trim();
  }
}
