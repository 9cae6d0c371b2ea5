/**
 * Incremental line splitter for text that arrives in arbitrary chunks.
 *
 * Recognizes `\n`, `\r\n` and a lone `\r` as terminators, including a `\r\n`
 * pair split across two chunks. A terminator at the very end of the input
 * does not produce an extra empty line.
 */
export class LineSplitter {
  private pending = '';
  private pendingCr = false;

  /** Feed a chunk; returns the lines it completed. */
  push(chunk: string): string[] {
    const lines: string[] = [];
    let text = chunk;

    if (this.pendingCr && text !== '') {
      this.pendingCr = false;
      if (text.startsWith('\n')) text = text.slice(1);
    }

    let from = 0;
    for (let i = 0; i < text.length; i++) {
      const ch = text.charCodeAt(i);
      if (ch !== 0x0a && ch !== 0x0d) continue;

      lines.push(this.pending + text.slice(from, i));
      this.pending = '';

      if (ch === 0x0d) {
        if (i + 1 === text.length) {
          this.pendingCr = true;
        } else if (text.charCodeAt(i + 1) === 0x0a) {
          i++;
        }
      }
      from = i + 1;
    }

    this.pending += text.slice(from);
    return lines;
  }

  /** Signal end of input; returns the unterminated last line, if any. */
  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    this.pendingCr = false;
    return rest === '' ? [] : [rest];
  }
}

/** Split a complete string into lines with the same rules as `LineSplitter`. */
export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.flush()];
}
