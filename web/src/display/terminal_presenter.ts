import { PresentationError } from "../errors/host_errors";
import type { DrawCommand, RectStyle, Viewport } from "./draw";

const ESC = "\x1b[";

export type CellTone = "default" | "weak" | "frame";
export type CellBackground = "default" | "fill" | "highlight";

export interface Cell {
  ch: string;
  tone: CellTone;
  bold: boolean;
  bg: CellBackground;
}

/** Where the presenter writes; `process.stdout` in the native build. */
export interface TerminalOutput {
  readonly writable: boolean;
  write(chunk: string): boolean;
}

function blankCell(): Cell {
  return { ch: " ", tone: "default", bold: false, bg: "default" };
}

function blankGrid(cols: number, rows: number): Cell[][] {
  return Array.from({ length: rows }, () => Array.from({ length: cols }, blankCell));
}

function cellAt(grid: Cell[][], x: number, y: number): Cell | undefined {
  return grid[y]?.[x];
}

function paintRect(grid: Cell[][], x0: number, y0: number, width: number, height: number, style: RectStyle): void {
  const x1 = x0 + width - 1;
  const y1 = y0 + height - 1;
  if (width <= 0 || height <= 0) return;
  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      const cell = cellAt(grid, x, y);
      if (!cell) continue;
      if (style !== "frame") {
        cell.bg = style;
        continue;
      }
      const top = y === y0;
      const bottom = y === y1;
      const left = x === x0;
      const right = x === x1;
      if (!top && !bottom && !left && !right) continue;
      cell.tone = "frame";
      if (top && left) cell.ch = "┌";
      else if (top && right) cell.ch = "┐";
      else if (bottom && left) cell.ch = "└";
      else if (bottom && right) cell.ch = "┘";
      else if (top || bottom) cell.ch = "─";
      else cell.ch = "│";
    }
  }
}

/** Lays commands out on a `cols × rows` cell grid, one cell per logical pixel. */
export function rasterize(commands: readonly DrawCommand[], cols: number, rows: number): Cell[][] {
  let grid = blankGrid(cols, rows);
  for (const command of commands) {
    switch (command.kind) {
      case "clear":
        grid = blankGrid(cols, rows);
        break;
      case "rect":
        paintRect(
          grid,
          Math.round(command.x),
          Math.round(command.y),
          Math.round(command.width),
          Math.round(command.height),
          command.style,
        );
        break;
      case "text": {
        let x = Math.round(command.x);
        const y = Math.round(command.y);
        for (const ch of command.text) {
          const cell = cellAt(grid, x, y);
          x += 1;
          if (!cell) continue;
          cell.ch = ch;
          cell.tone = command.style === "weak" ? "weak" : "default";
          cell.bold = command.style === "heading";
        }
        break;
      }
    }
  }
  return grid;
}

function sgr(cell: Cell): string {
  const codes = ["0"];
  if (cell.bold) codes.push("1");
  if (cell.tone === "weak") codes.push("90");
  else if (cell.tone === "frame") codes.push("37");
  if (cell.bg === "fill") codes.push("44");
  else if (cell.bg === "highlight") codes.push("100");
  return `${ESC}${codes.join(";")}m`;
}

/** One grid row as text with SGR escapes, ending in a reset. */
export function renderRow(row: readonly Cell[]): string {
  let out = "";
  let current = "";
  for (const cell of row) {
    const style = sgr(cell);
    if (style !== current) {
      out += style;
      current = style;
    }
    out += cell.ch;
  }
  return `${out}${ESC}0m`;
}

/**
 * Writes frames to a terminal with ANSI escapes. Only rows that changed since
 * the previous frame are rewritten.
 */
export class TerminalPresenter {
  private previous: string[] = [];
  private cols = 0;
  private rows = 0;

  constructor(private readonly out: TerminalOutput) {}

  present(commands: readonly DrawCommand[], viewport: Viewport): void {
    if (!this.out.writable) {
      throw new PresentationError("Terminal output is closed.");
    }
    const cols = Math.max(0, Math.floor(viewport.width));
    const rows = Math.max(0, Math.floor(viewport.height));
    let chunk = "";
    if (cols !== this.cols || rows !== this.rows) {
      this.cols = cols;
      this.rows = rows;
      this.previous = [];
      chunk += `${ESC}0m${ESC}2J`;
    }

    const grid = rasterize(commands, cols, rows);
    grid.forEach((row, y) => {
      const line = renderRow(row);
      if (this.previous[y] === line) return;
      this.previous[y] = line;
      chunk += `${ESC}${y + 1};1H${line}`;
    });
    if (chunk === "") return;

    try {
      this.out.write(chunk);
    } catch (err) {
      throw new PresentationError("Terminal write failed.", { cause: err });
    }
  }

  /** Forces the next frame to repaint every row (after the terminal was cleared by someone else). */
  invalidate(): void {
    this.previous = [];
  }
}
