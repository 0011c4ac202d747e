import { CellGrid, DEFAULT_STYLE, type Cell, type CellStyle, type SurfaceSize, type TerminalSurface } from "./surface";

/**
 * Headless surface that records every flushed frame as plain text
 */
export class MemorySurface implements TerminalSurface {
  readonly frames: string[][] = [];
  private grid: CellGrid;
  private interruptHandlers: Array<() => void> = [];
  private closed = false;

  constructor(width = 80, height = 24) {
    this.grid = new CellGrid(width, height);
  }

  setCell(x: number, y: number, ch: string, style: CellStyle = DEFAULT_STYLE): void {
    this.grid.set(x, y, ch, style);
  }

  flush(): void {
    this.frames.push(this.grid.lines());
  }

  size(): SurfaceSize {
    return this.grid.size;
  }

  close(): void {
    this.closed = true;
    this.interruptHandlers = [];
  }

  // Simulate a terminal resize; existing cells are kept like a real back buffer
  resize(width: number, height: number): void {
    this.grid.resize(width, height);
  }

  onInterrupt(handler: () => void): void {
    this.interruptHandlers.push(handler);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Simulate the interrupt key
   */
  pressInterrupt(): void {
    for (const handler of this.interruptHandlers) {
      handler();
    }
  }

  cellAt(x: number, y: number): Cell | undefined {
    return this.grid.get(x, y);
  }

  lastFrame(): string[] {
    return this.frames[this.frames.length - 1] ?? [];
  }

  // Last frame with trailing blanks removed from each row
  lastFrameText(): string[] {
    return this.lastFrame().map((line) => line.trimEnd());
  }
}
