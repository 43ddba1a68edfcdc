export interface Line {
  /** 1-based */
  readonly number: number;
  readonly text: string;
}

/**
 * Forward-only reader over the lines of a text. Lines end in `\n` or `\r\n`;
 * a trailing terminator does not yield an extra empty line.
 */
export class LineCursor {
  private readonly lines: string[];
  private position = 0;

  constructor(text: string) {
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    this.lines = lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  next(): Line | null {
    const text = this.lines[this.position];
    if (text === undefined) return null;
    this.position++;
    return { number: this.position, text };
  }
}
