import type { RectStyle, TextStyle } from "../display/draw";
import type { FrameContext, FrameOutput } from "../main/frame_context";

interface Point {
  x: number;
  y: number;
}

interface Rect extends Point {
  width: number;
  height: number;
}

/** What the widgets remember between frames. */
export interface UiMemory {
  focused: string | null;
  pointer: Point | null;
  pressOrigin: Point | null;
}

export function createUiMemory(focused: string | null = null): UiMemory {
  return { focused, pointer: null, pressOrigin: null };
}

function contains(rect: Rect, p: Point): boolean {
  return p.x >= rect.x && p.x < rect.x + rect.width && p.y >= rect.y && p.y < rect.y + rect.height;
}

/**
 * Immediate-mode widget helpers. Widgets are laid out left to right on lines
 * of `text.lineHeight`, measured in monospace cells.
 */
export class Ui {
  private readonly clicks: Array<{ from: Point; to: Point }> = [];
  private readonly cw: number;
  private readonly lh: number;
  private x: number;
  private y: number;
  private clickConsumedByField = false;

  constructor(
    private readonly ctx: FrameContext,
    private readonly output: FrameOutput,
    private readonly memory: UiMemory,
  ) {
    this.cw = ctx.viewport.text.charWidth;
    this.lh = ctx.viewport.text.lineHeight;
    this.x = this.cw;
    this.y = 0;

    for (const event of ctx.events) {
      switch (event.kind) {
        case "pointer-move":
          memory.pointer = { x: event.x, y: event.y };
          break;
        case "pointer-button":
          memory.pointer = { x: event.x, y: event.y };
          if (event.button !== "primary") break;
          if (event.pressed) {
            memory.pressOrigin = { x: event.x, y: event.y };
          } else if (memory.pressOrigin) {
            this.clicks.push({ from: memory.pressOrigin, to: { x: event.x, y: event.y } });
            memory.pressOrigin = null;
          }
          break;
        case "focus-change":
          if (!event.focused) memory.pressOrigin = null;
          break;
        default:
          break;
      }
    }
  }

  /** Starts a new line; `lines` > 1 leaves blank lines in between. */
  newLine(lines = 1): void {
    this.x = this.cw;
    this.y += this.lh * lines;
  }

  /** Moves to column `chars` of the current line. */
  column(chars: number): void {
    this.x = this.cw * chars;
  }

  space(chars = 1): void {
    this.x += this.cw * chars;
  }

  label(text: string, style: TextStyle = "normal"): void {
    this.output.draw({ kind: "text", x: this.x, y: this.y, text, style });
    this.x += this.width(text);
  }

  heading(text: string): void {
    this.label(text, "heading");
  }

  /** Returns true on the frame the button is clicked. */
  button(text: string): boolean {
    const caption = `[${text}]`;
    const rect = { x: this.x, y: this.y, width: this.width(caption), height: this.lh };
    if (this.memory.pointer && contains(rect, this.memory.pointer)) this.rect(rect, "highlight");
    this.label(caption);
    this.space();
    return this.clicks.some((c) => contains(rect, c.from) && contains(rect, c.to));
  }

  /**
   * Single-line text field. Takes keyboard input while focused; a click
   * focuses it. Returns the edited value.
   */
  textField(id: string, value: string, widthChars: number): string {
    const rect = { x: this.x, y: this.y, width: this.cw * widthChars, height: this.lh };
    if (this.clicks.some((c) => contains(rect, c.to))) {
      this.memory.focused = id;
      this.clickConsumedByField = true;
    }

    let next = value;
    if (this.memory.focused === id) {
      for (const event of this.ctx.events) {
        if (event.kind === "text-input") next += event.text;
        else if (event.kind === "key-down" && event.key === "Backspace") next = Array.from(next).slice(0, -1).join("");
      }
    }

    const focused = this.memory.focused === id;
    this.rect(rect, focused ? "fill" : "highlight");
    // Show the end of long values.
    const chars = Array.from(next);
    const room = Math.max(0, widthChars - 1);
    const visible = chars.length > room ? chars.slice(chars.length - room).join("") : next;
    this.output.draw({ kind: "text", x: this.x, y: this.y, text: focused ? `${visible}_` : visible, style: "normal" });
    this.x += rect.width;
    this.space();
    return next;
  }

  /** Bar of `widthChars` cells filled to `fraction`, with the percentage on top. */
  progressBar(fraction: number, widthChars: number, caption: string): void {
    const width = this.cw * widthChars;
    this.rect({ x: this.x, y: this.y, width, height: this.lh }, "highlight");
    const filled = Math.round(width * Math.min(1, Math.max(0, fraction)));
    if (filled > 0) this.rect({ x: this.x, y: this.y, width: filled, height: this.lh }, "fill");
    this.output.draw({ kind: "text", x: this.x + this.cw, y: this.y, text: caption, style: "normal" });
    this.x += width;
    this.space();
  }

  /** Draws a frame around everything between `top` and the current line. */
  frameFrom(top: number, widthChars: number): void {
    this.rect({ x: 0, y: top, width: this.cw * widthChars, height: this.y - top + this.lh }, "frame");
  }

  get cursorY(): number {
    return this.y;
  }

  /** Drops text focus when this frame had a click outside every text field. */
  finish(): void {
    if (this.clicks.length > 0 && !this.clickConsumedByField) this.memory.focused = null;
  }

  private rect(rect: Rect, style: RectStyle): void {
    this.output.draw({ kind: "rect", x: rect.x, y: rect.y, width: rect.width, height: rect.height, style });
  }

  private width(text: string): number {
    return Array.from(text).length * this.cw;
  }
}
