export type InputEventKind =
  | "pointer-move"
  | "pointer-button"
  | "key-down"
  | "key-up"
  | "text-input"
  | "scroll"
  | "host-resize"
  | "focus-change";

export type PointerButton = "primary" | "secondary" | "middle" | "back" | "forward";

export interface Modifiers {
  readonly shift: boolean;
  readonly ctrl: boolean;
  readonly alt: boolean;
  readonly meta: boolean;
}

export const NO_MODIFIERS: Modifiers = Object.freeze({ shift: false, ctrl: false, alt: false, meta: false });

interface InputEventBase {
  /** Strictly increasing per translator; never reused. */
  readonly seq: number;
  /** Host clock, milliseconds. */
  readonly timestampMs: number;
}

export interface PointerMoveEvent extends InputEventBase {
  readonly kind: "pointer-move";
  readonly x: number;
  readonly y: number;
}

export interface PointerButtonEvent extends InputEventBase {
  readonly kind: "pointer-button";
  readonly button: PointerButton;
  readonly pressed: boolean;
  readonly x: number;
  readonly y: number;
  readonly modifiers: Modifiers;
}

export interface KeyEvent extends InputEventBase {
  readonly kind: "key-down" | "key-up";
  /** Logical key, in `KeyboardEvent.code` vocabulary (`KeyA`, `Enter`, ...). */
  readonly key: string;
  readonly repeat: boolean;
  readonly modifiers: Modifiers;
}

export interface TextInputEvent extends InputEventBase {
  readonly kind: "text-input";
  readonly text: string;
}

export interface ScrollEvent extends InputEventBase {
  readonly kind: "scroll";
  readonly dx: number;
  readonly dy: number;
}

export interface HostResizeEvent extends InputEventBase {
  readonly kind: "host-resize";
  readonly width: number;
  readonly height: number;
  readonly scaleFactor: number;
}

export interface FocusChangeEvent extends InputEventBase {
  readonly kind: "focus-change";
  readonly focused: boolean;
}

export type InputEvent =
  | PointerMoveEvent
  | PointerButtonEvent
  | KeyEvent
  | TextInputEvent
  | ScrollEvent
  | HostResizeEvent
  | FocusChangeEvent;

/**
 * Key and button events come in press/release pairs. The queue never splits a
 * pair when it has to evict.
 */
export function isPairedInput(event: InputEvent): event is KeyEvent | PointerButtonEvent {
  return event.kind === "key-down" || event.kind === "key-up" || event.kind === "pointer-button";
}

export function isPress(event: KeyEvent | PointerButtonEvent): boolean {
  return event.kind === "pointer-button" ? event.pressed : event.kind === "key-down";
}

/** Identity shared by a press and its release (`key:KeyA`, `button:primary`). */
export function pairKey(event: KeyEvent | PointerButtonEvent): string {
  return event.kind === "pointer-button" ? `button:${event.button}` : `key:${event.key}`;
}

/**
 * Host input before translation. Positions and sizes are device pixels; key
 * and button codes are host-specific.
 */
export type RawInput =
  | { type: "pointer-move"; x: number; y: number; timestampMs: number }
  | { type: "pointer-button"; button: number; pressed: boolean; x: number; y: number; modifiers?: Modifiers; timestampMs: number }
  | {
      type: "key";
      /** USB HID usage (native hosts). */
      scanCode?: number;
      /** `KeyboardEvent.code` (browser hosts). */
      code?: string;
      pressed: boolean;
      repeat?: boolean;
      modifiers: Modifiers;
      timestampMs: number;
    }
  | { type: "text"; text: string; timestampMs: number }
  | { type: "scroll"; dx: number; dy: number; unit: "pixel" | "line" | "page"; timestampMs: number }
  | { type: "resize"; width: number; height: number; scaleFactor: number; timestampMs: number }
  | { type: "focus"; focused: boolean; timestampMs: number };
