/** Line-oriented source for SCAN; `null` means end of input */
export interface InputSource {
  readLine(): string | null;
}

export class LinesInput implements InputSource {
  private next = 0;

  constructor(private lines: readonly string[] = []) {}

  public readLine = (): string | null =>
    this.next < this.lines.length ? this.lines[this.next++] : null;
}
