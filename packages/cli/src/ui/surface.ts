export type CellColor = "default" | "white" | "blue" | "red" | "yellow" | "green";

export interface CellStyle {
  readonly fg?: CellColor;
  readonly bg?: CellColor;
  readonly bold?: boolean;
}

export interface SurfaceSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Fixed cell grid owned by the dashboard. Writes are invisible until `flush`.
 * Cells outside the grid are ignored.
 */
export interface TerminalSurface {
  setCell(x: number, y: number, ch: string, style?: CellStyle): void;
  flush(): void;
  size(): SurfaceSize;
  close(): void;
  // Called when the user presses the interrupt key while the surface owns input
  onInterrupt(handler: () => void): void;
}

export const DEFAULT_STYLE: CellStyle = Object.freeze({});

export interface Cell {
  ch: string;
  style: CellStyle;
}

/**
 * Shared back buffer for surfaces that render a whole frame at flush time
 */
export class CellGrid {
  private rows: Cell[][] = [];

  constructor(
    private width: number,
    private height: number,
  ) {
    this.resize(width, height);
  }

  resize(width: number, height: number): void {
    const rows: Cell[][] = [];
    for (let y = 0; y < height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < width; x++) {
        row.push(this.rows[y]?.[x] ?? { ch: " ", style: DEFAULT_STYLE });
      }
      rows.push(row);
    }
    this.rows = rows;
    this.width = width;
    this.height = height;
  }

  get size(): SurfaceSize {
    return { width: this.width, height: this.height };
  }

  set(x: number, y: number, ch: string, style: CellStyle): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    this.rows[y][x] = { ch, style };
  }

  get(x: number, y: number): Cell | undefined {
    return this.rows[y]?.[x];
  }

  lines(): string[] {
    return this.rows.map((row) => row.map((cell) => cell.ch).join(""));
  }

  cells(): readonly (readonly Cell[])[] {
    return this.rows;
  }
}
