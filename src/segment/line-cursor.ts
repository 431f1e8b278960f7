import type { ShaderLine, ShaderSource } from "../types.ts";

export class LineCursor {
  private readonly lines: readonly ShaderLine[];
  private _index = 0;

  constructor(lines: readonly ShaderLine[]) {
    this.lines = lines;
  }

  /** Splits source into lines, dropping blank ones. */
  static fromSource(source: ShaderSource): LineCursor {
    return new LineCursor(source.split(/\r?\n/).filter((line) => line.trim() !== ""));
  }

  get done(): boolean {
    return this._index >= this.lines.length;
  }

  next(): ShaderLine | undefined {
    const line = this.lines[this._index];
    if (line !== undefined) this._index += 1;
    return line;
  }

  /** Steps back over the line just returned by `next`. */
  back(): void {
    if (this._index > 0) this._index -= 1;
  }

  rest(): readonly ShaderLine[] {
    return this.lines.slice(this._index);
  }
}
