import blessed from "blessed";
import { CellGrid, DEFAULT_STYLE, type Cell, type CellStyle, type SurfaceSize, type TerminalSurface } from "./surface";

function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

function openTags(style: CellStyle): string {
  let tags = "";
  if (style.bold) tags += "{bold}";
  if (style.fg && style.fg !== "default") tags += `{${style.fg}-fg}`;
  if (style.bg && style.bg !== "default") tags += `{${style.bg}-bg}`;
  return tags;
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.bold === b.bold && a.fg === b.fg && a.bg === b.bg;
}

/**
 * One grid row as blessed tag markup. Adjacent cells with the same style share a tag run.
 */
export function renderRow(row: readonly Cell[]): string {
  let out = "";
  let run = "";
  let runStyle: CellStyle = DEFAULT_STYLE;

  const closeRun = () => {
    if (run.length === 0) return;
    const tags = openTags(runStyle);
    out += tags ? `${tags}${escapeTags(run)}{/}` : escapeTags(run);
    run = "";
  };

  for (const cell of row) {
    if (!sameStyle(cell.style, runStyle)) {
      closeRun();
      runStyle = cell.style;
    }
    run += cell.ch;
  }
  closeRun();
  return out;
}

/**
 * Full-screen terminal surface backed by blessed.
 * Throws when stdout is not a terminal.
 */
export class BlessedSurface implements TerminalSurface {
  private screen: ReturnType<typeof blessed.screen>;
  private box: ReturnType<typeof blessed.box>;
  private grid: CellGrid;
  private closed = false;

  constructor(title = "swarmwatch") {
    if (!process.stdout.isTTY) {
      throw new Error("Failed to initialise terminal: stdout is not a TTY");
    }

    this.screen = blessed.screen({ smartCSR: true, title });
    this.box = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: "100%",
      height: "100%",
      tags: true,
    });
    this.grid = new CellGrid(this.columns(), this.rowsCount());

    this.screen.on("resize", () => {
      this.grid.resize(this.columns(), this.rowsCount());
      this.flush();
    });
  }

  private columns(): number {
    return Number(this.screen.width) || 80;
  }

  private rowsCount(): number {
    return Number(this.screen.height) || 24;
  }

  setCell(x: number, y: number, ch: string, style: CellStyle = DEFAULT_STYLE): void {
    this.grid.set(x, y, ch, style);
  }

  flush(): void {
    if (this.closed) return;
    this.box.setContent(this.grid.cells().map(renderRow).join("\n"));
    this.screen.render();
  }

  size(): SurfaceSize {
    return this.grid.size;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.screen.destroy();
  }

  onInterrupt(handler: () => void): void {
    this.screen.key(["C-c"], () => handler());
  }
}
