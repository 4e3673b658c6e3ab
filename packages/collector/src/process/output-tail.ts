/**
 * Keeps the last `maxChars` characters of a line stream.
 */
export class OutputTail {
  private readonly maxChars: number;
  private readonly lines: string[];
  private size: number;
  private dropped: boolean;

  constructor(maxChars: number) {
    this.maxChars = Math.max(1, maxChars);
    this.lines = [];
    this.size = 0;
    this.dropped = false;
  }

  push(line: string): void {
    this.lines.push(line);
    this.size += line.length + 1;

    while (this.size > this.maxChars && this.lines.length > 1) {
      const removed = this.lines.shift();
      this.size -= (removed?.length ?? 0) + 1;
      this.dropped = true;
    }
  }

  toString(): string {
    const body = this.lines.join('\n');
    const text = body.length > this.maxChars ? body.slice(-this.maxChars) : body;
    return this.dropped || body.length > this.maxChars ? `...\n${text}` : text;
  }
}
