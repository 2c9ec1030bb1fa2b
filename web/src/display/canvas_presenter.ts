import { PresentationError } from "../errors/host_errors";
import type { DrawCommand, RectStyle, TextStyle, Viewport } from "./draw";

/** The part of `CanvasRenderingContext2D` the presenter draws with. */
export type PresenterContext2D = Pick<
  CanvasRenderingContext2D,
  "setTransform" | "fillRect" | "strokeRect" | "fillText" | "fillStyle" | "strokeStyle" | "lineWidth" | "font" | "textBaseline"
> & { isContextLost?(): boolean };

export interface PresenterCanvas {
  readonly isConnected: boolean;
  width: number;
  height: number;
  getContext(contextId: "2d"): PresenterContext2D | null;
}

export interface CanvasTheme {
  background: string;
  foreground: string;
  weak: string;
  frame: string;
  fill: string;
  highlight: string;
  fontFamily: string;
}

export const DEFAULT_CANVAS_THEME: CanvasTheme = {
  background: "#1b1b1b",
  foreground: "#dcdcdc",
  weak: "#8c8c8c",
  frame: "#5a5a5a",
  fill: "#3c6e9f",
  highlight: "#2f4f6f",
  fontFamily: "ui-monospace, Menlo, Consolas, monospace",
};

/**
 * Draws {@link DrawCommand}s with Canvas 2D. The backing store follows
 * `viewport × scaleFactor`; commands stay in logical pixels.
 */
export class CanvasPresenter {
  private ctx: PresenterContext2D | null = null;

  constructor(
    private readonly canvas: PresenterCanvas,
    private readonly theme: CanvasTheme = DEFAULT_CANVAS_THEME,
  ) {}

  present(commands: readonly DrawCommand[], viewport: Viewport): void {
    const ctx = this.context();
    const scale = viewport.scaleFactor;
    const width = Math.max(1, Math.round(viewport.width * scale));
    const height = Math.max(1, Math.round(viewport.height * scale));
    // Assigning the size clears the canvas, so only do it when it changed.
    if (this.canvas.width !== width) this.canvas.width = width;
    if (this.canvas.height !== height) this.canvas.height = height;

    ctx.setTransform(scale, 0, 0, scale, 0, 0);
    ctx.textBaseline = "top";
    for (const command of commands) {
      switch (command.kind) {
        case "clear":
          ctx.fillStyle = this.theme.background;
          ctx.fillRect(0, 0, viewport.width, viewport.height);
          break;
        case "rect":
          this.rect(ctx, command.x, command.y, command.width, command.height, command.style);
          break;
        case "text":
          ctx.font = this.font(command.style, viewport.text.lineHeight);
          ctx.fillStyle = command.style === "weak" ? this.theme.weak : this.theme.foreground;
          ctx.fillText(command.text, command.x, command.y);
          break;
      }
    }
  }

  private context(): PresenterContext2D {
    if (!this.canvas.isConnected) {
      throw new PresentationError("Canvas was removed from the document.");
    }
    if (!this.ctx) {
      this.ctx = this.canvas.getContext("2d");
      if (!this.ctx) throw new PresentationError("2D canvas context not available.");
    }
    if (this.ctx.isContextLost?.() === true) {
      throw new PresentationError("2D canvas context was lost.");
    }
    return this.ctx;
  }

  private rect(ctx: PresenterContext2D, x: number, y: number, width: number, height: number, style: RectStyle): void {
    if (style === "frame") {
      ctx.strokeStyle = this.theme.frame;
      ctx.lineWidth = 1;
      ctx.strokeRect(x + 0.5, y + 0.5, Math.max(0, width - 1), Math.max(0, height - 1));
      return;
    }
    ctx.fillStyle = style === "fill" ? this.theme.fill : this.theme.highlight;
    ctx.fillRect(x, y, width, height);
  }

  private font(style: TextStyle, lineHeight: number): string {
    const size = Math.max(1, Math.round(lineHeight * 0.8));
    return `${style === "heading" ? "bold " : ""}${size}px ${this.theme.fontFamily}`;
  }
}
