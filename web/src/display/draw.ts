export type RectStyle = "frame" | "fill" | "highlight";
export type TextStyle = "normal" | "heading" | "weak";

/** Positions and sizes are logical pixels; `text` is anchored at its top-left corner. */
export type DrawCommand =
  | { readonly kind: "clear" }
  | {
      readonly kind: "rect";
      readonly x: number;
      readonly y: number;
      readonly width: number;
      readonly height: number;
      readonly style: RectStyle;
    }
  | { readonly kind: "text"; readonly x: number; readonly y: number; readonly text: string; readonly style: TextStyle };

/** Monospace cell size the UI logic lays text out with. */
export interface TextMetrics {
  readonly charWidth: number;
  readonly lineHeight: number;
}

export interface Viewport {
  /** Logical pixels. */
  readonly width: number;
  readonly height: number;
  /** Device pixels per logical pixel. */
  readonly scaleFactor: number;
  readonly text: TextMetrics;
}

export function measureText(metrics: TextMetrics, text: string): number {
  return Array.from(text).length * metrics.charWidth;
}
