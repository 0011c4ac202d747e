import type { RegionSnapshot } from "../types";
import { formatRegion } from "../stats/region-format";
import { DEFAULT_STYLE, type CellStyle, type TerminalSurface } from "./surface";

export const BAR_WIDTH = 52;
export const LAUNCH_MESSAGE = "Launching regional workers... (be patient)";
export const CANCEL_HINT = "Press ctrl-c to interrupt";
export const REGION_LABEL = "Region: ";

// First row used by region blocks; rows 0-1 hold the progress line and bar
export const REGIONS_TOP = 3;

const LOGO = [
  String.raw`  ____                                               _       _     `,
  String.raw` / ___|_      ____ _ _ __ _ __ _____      ____ _ | |_ ___| |__  `,
  String.raw` \___ \ \ /\ / / _' | '__| '_ ' _ \ \ /\ / / _' || __/ __| '_ \ `,
  String.raw`  ___) \ V  V / (_| | |  | | | | | \ V  V / (_| || || (__| | | |`,
  String.raw` |____/ \_/\_/ \__,_|_|  |_| |_| |_|\_/\_/ \__,_| \__\___|_| |_|`,
  "",
  " Live results from every region",
];

const BOLD: CellStyle = { bold: true };
const LABEL_STYLE: CellStyle = { fg: "white", bg: "blue" };
const REGION_ID_STYLE: CellStyle = { fg: "white", bg: "blue", bold: true };
const WARNING_STYLE: CellStyle = { fg: "red" };

export function clampFraction(fraction: number): number {
  if (!Number.isFinite(fraction) || fraction < 0) return 0;
  return Math.min(fraction, 1);
}

/**
 * Number of filled bar segments. Anything above 0.99 shows a full bar.
 */
export function filledSegments(fraction: number, width = BAR_WIDTH): number {
  const clamped = clampFraction(fraction);
  if (clamped > 0.99) {
    return width;
  }
  return Math.floor(clamped * width);
}

export function formatPercent(fraction: number): string {
  return `${(clampFraction(fraction) * 100).toFixed(1).padStart(5)}%`;
}

export function progressBar(fraction: number, width = BAR_WIDTH): string {
  const filled = filledSegments(fraction, width);
  return `[${"#".repeat(filled)}${" ".repeat(width - filled)}]`;
}

export class DashboardRenderer {
  private bannerVisible = false;
  private bannerCleared = false;

  constructor(private surface: TerminalSurface) {}

  /**
   * Launch message and logo, shown until the first results arrive
   */
  showLaunchScreen(): void {
    if (this.bannerCleared) return;
    this.writeText(0, 0, LAUNCH_MESSAGE);
    LOGO.forEach((line, i) => this.writeText(0, i + 1, line));
    this.bannerVisible = true;
    this.surface.flush();
  }

  // Overwrites the launch screen footprint with blanks; only ever runs once
  clearLaunchScreen(): void {
    if (this.bannerCleared) return;
    this.bannerCleared = true;
    if (!this.bannerVisible) return;

    const rows = [LAUNCH_MESSAGE, ...LOGO];
    const width = Math.max(...rows.map((row) => row.length));
    const blank = " ".repeat(width);
    rows.forEach((_, y) => this.writeText(0, y, blank));
    this.bannerVisible = false;
  }

  get launchScreenCleared(): boolean {
    return this.bannerCleared;
  }

  showHint(): void {
    this.drawHint();
    this.surface.flush();
  }

  /**
   * Redraw the whole dashboard for one envelope. `regions` must already be in display order.
   */
  render(regions: readonly RegionSnapshot[], fraction: number): void {
    this.writeLine(0, formatPercent(fraction));
    this.writeLine(1, progressBar(fraction));
    this.writeLine(2, "");

    let y = REGIONS_TOP;
    for (const region of regions) {
      y = this.renderRegion(region, y);
      this.writeLine(y, "");
      y++;
    }

    // Blank down to the hint row
    const { height } = this.surface.size();
    for (let row = y; row < height - 1; row++) {
      this.writeLine(row, "");
    }

    this.drawHint();
    this.surface.flush();
  }

  // Returns the row following the block
  private renderRegion(region: RegionSnapshot, y: number): number {
    const rows = formatRegion(region);

    this.writeLine(y, "");
    this.writeText(0, y, REGION_LABEL, LABEL_STYLE);
    this.writeText(REGION_LABEL.length, y, region.region, REGION_ID_STYLE);
    y++;

    this.writeLine(y++, rows.throughputHeading, BOLD);
    this.writeLine(y++, rows.throughput);
    this.writeLine(y++, rows.latencyHeading, BOLD);
    this.writeLine(y++, rows.latency, rows.diagnostics.length > 0 ? WARNING_STYLE : DEFAULT_STYLE);
    return y;
  }

  private drawHint(): void {
    const { height } = this.surface.size();
    this.writeLine(height - 1, CANCEL_HINT);
  }

  private writeText(x: number, y: number, text: string, style: CellStyle = DEFAULT_STYLE): number {
    let col = x;
    for (const ch of text) {
      this.surface.setCell(col, y, ch, style);
      col++;
    }
    return col;
  }

  // Writes `text` from column 0 and blanks the remainder of the row
  private writeLine(y: number, text: string, style: CellStyle = DEFAULT_STYLE): void {
    const end = this.writeText(0, y, text, style);
    const { width } = this.surface.size();
    for (let x = end; x < width; x++) {
      this.surface.setCell(x, y, " ", DEFAULT_STYLE);
    }
  }
}
