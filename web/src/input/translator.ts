import { US_KEYBOARD_LAYOUT, type KeyboardLayout } from "./keyboard_layout";
import {
  NO_MODIFIERS,
  type InputEvent,
  type Modifiers,
  type PointerButton,
  type RawInput,
} from "./types";

/** Logical pixels per wheel line. */
export const SCROLL_LINE_PX = 20;
/** Wheel lines per page (`WheelEvent.DOM_DELTA_PAGE`). */
export const SCROLL_PAGE_LINES = 20;

const MIN_SCALE_FACTOR = 0.25;
const MAX_SCALE_FACTOR = 8;

/**
 * Host-specific code tables. The translator applies the same normalization to
 * every host; only these tables differ.
 */
export interface HostInputProfile {
  readonly name: string;
  readonly buttons: ReadonlyMap<number, PointerButton>;
  readonly keyboard: KeyboardLayout;
}

// `MouseEvent.button` numbering.
export const BROWSER_INPUT_PROFILE: HostInputProfile = Object.freeze({
  name: "browser",
  buttons: new Map<number, PointerButton>([
    [0, "primary"],
    [1, "middle"],
    [2, "secondary"],
    [3, "back"],
    [4, "forward"],
  ]),
  keyboard: US_KEYBOARD_LAYOUT,
});

// X11-style numbering, also used by xterm mouse reporting (1-based).
export const NATIVE_INPUT_PROFILE: HostInputProfile = Object.freeze({
  name: "native",
  buttons: new Map<number, PointerButton>([
    [1, "primary"],
    [2, "middle"],
    [3, "secondary"],
    [8, "back"],
    [9, "forward"],
  ]),
  keyboard: US_KEYBOARD_LAYOUT,
});

export interface TranslatorDiagnostics {
  translated: number;
  unrecognized: number;
  /** Releases dropped because the matching press was never seen. */
  orphanReleases: number;
  /** Releases synthesized on focus loss. */
  synthesizedReleases: number;
}

export interface InputTranslatorOptions {
  /** Host-reported device pixels per logical pixel. */
  scaleFactor?: number;
  /** Fixed scale factor that wins over whatever the host reports. */
  scaleFactorOverride?: number | null;
}

export function sanitizeScaleFactor(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return 1;
  return Math.min(MAX_SCALE_FACTOR, Math.max(MIN_SCALE_FACTOR, value));
}

function stripControlChars(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)) continue;
    out += ch;
  }
  return out;
}

/**
 * Turns raw host input into host-neutral {@link InputEvent}s.
 *
 * One raw input yields zero or more events: unrecognized codes yield none, a
 * focus loss yields a release for everything still held followed by the
 * focus event.
 */
export class InputTranslator {
  private readonly profile: HostInputProfile;
  private readonly scaleOverride: number | null;
  private hostScale: number;
  private nextSeq = 1;
  private pointerX = 0;
  private pointerY = 0;
  private readonly heldKeys = new Set<string>();
  private readonly heldButtons = new Set<PointerButton>();
  private readonly stats: TranslatorDiagnostics = {
    translated: 0,
    unrecognized: 0,
    orphanReleases: 0,
    synthesizedReleases: 0,
  };

  constructor(profile: HostInputProfile, options: InputTranslatorOptions = {}) {
    this.profile = profile;
    const override = options.scaleFactorOverride;
    this.scaleOverride = override === undefined || override === null ? null : sanitizeScaleFactor(override);
    this.hostScale = sanitizeScaleFactor(options.scaleFactor ?? 1);
  }

  get scaleFactor(): number {
    return this.scaleOverride ?? this.hostScale;
  }

  setHostScaleFactor(value: number): void {
    this.hostScale = sanitizeScaleFactor(value);
  }

  /** Device pixels to logical pixels. */
  toLogical(devicePx: number): number {
    return devicePx / this.scaleFactor;
  }

  diagnostics(): TranslatorDiagnostics {
    return { ...this.stats };
  }

  translate(raw: RawInput): InputEvent[] {
    switch (raw.type) {
      case "pointer-move":
        return this.translatePointerMove(raw.x, raw.y, raw.timestampMs);
      case "pointer-button":
        return this.translatePointerButton(raw);
      case "key":
        return this.translateKey(raw);
      case "text": {
        const text = stripControlChars(raw.text);
        if (text.length === 0) return [];
        return [this.emit({ kind: "text-input", text, timestampMs: raw.timestampMs })];
      }
      case "scroll":
        return this.translateScroll(raw.dx, raw.dy, raw.unit, raw.timestampMs);
      case "resize":
        return this.translateResize(raw.width, raw.height, raw.scaleFactor, raw.timestampMs);
      case "focus":
        return this.translateFocus(raw.focused, raw.timestampMs);
    }
  }

  private emit(event: DistributiveOmit<InputEvent, "seq">): InputEvent {
    const seq = this.nextSeq++;
    this.stats.translated += 1;
    return Object.freeze({ ...event, seq });
  }

  private reject(): InputEvent[] {
    this.stats.unrecognized += 1;
    return [];
  }

  private translatePointerMove(x: number, y: number, timestampMs: number): InputEvent[] {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return this.reject();
    this.pointerX = this.toLogical(x);
    this.pointerY = this.toLogical(y);
    return [this.emit({ kind: "pointer-move", x: this.pointerX, y: this.pointerY, timestampMs })];
  }

  private translatePointerButton(raw: Extract<RawInput, { type: "pointer-button" }>): InputEvent[] {
    const button = this.profile.buttons.get(raw.button);
    if (!button || !Number.isFinite(raw.x) || !Number.isFinite(raw.y)) return this.reject();

    if (raw.pressed) {
      this.heldButtons.add(button);
    } else if (!this.heldButtons.delete(button)) {
      this.stats.orphanReleases += 1;
      return [];
    }

    this.pointerX = this.toLogical(raw.x);
    this.pointerY = this.toLogical(raw.y);
    return [
      this.emit({
        kind: "pointer-button",
        button,
        pressed: raw.pressed,
        x: this.pointerX,
        y: this.pointerY,
        modifiers: raw.modifiers ?? NO_MODIFIERS,
        timestampMs: raw.timestampMs,
      }),
    ];
  }

  private translateKey(raw: Extract<RawInput, { type: "key" }>): InputEvent[] {
    let key: string | null = null;
    if (typeof raw.scanCode === "number") {
      key = this.profile.keyboard.resolveScanCode(raw.scanCode);
    } else if (typeof raw.code === "string") {
      key = this.profile.keyboard.resolveCode(raw.code);
    }
    if (key === null) return this.reject();

    const modifiers = freezeModifiers(raw.modifiers);
    if (raw.pressed) {
      const repeat = raw.repeat === true || this.heldKeys.has(key);
      this.heldKeys.add(key);
      return [this.emit({ kind: "key-down", key, repeat, modifiers, timestampMs: raw.timestampMs })];
    }

    if (!this.heldKeys.delete(key)) {
      this.stats.orphanReleases += 1;
      return [];
    }
    return [this.emit({ kind: "key-up", key, repeat: false, modifiers, timestampMs: raw.timestampMs })];
  }

  private translateScroll(dx: number, dy: number, unit: "pixel" | "line" | "page", timestampMs: number): InputEvent[] {
    if (!Number.isFinite(dx) || !Number.isFinite(dy)) return this.reject();
    let sx: number;
    let sy: number;
    switch (unit) {
      case "pixel":
        sx = this.toLogical(dx);
        sy = this.toLogical(dy);
        break;
      case "line":
        sx = dx * SCROLL_LINE_PX;
        sy = dy * SCROLL_LINE_PX;
        break;
      case "page":
        sx = dx * SCROLL_LINE_PX * SCROLL_PAGE_LINES;
        sy = dy * SCROLL_LINE_PX * SCROLL_PAGE_LINES;
        break;
    }
    return [this.emit({ kind: "scroll", dx: sx, dy: sy, timestampMs })];
  }

  private translateResize(width: number, height: number, scaleFactor: number, timestampMs: number): InputEvent[] {
    if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) return this.reject();
    this.setHostScaleFactor(scaleFactor);
    return [
      this.emit({
        kind: "host-resize",
        width: this.toLogical(width),
        height: this.toLogical(height),
        scaleFactor: this.scaleFactor,
        timestampMs,
      }),
    ];
  }

  private translateFocus(focused: boolean, timestampMs: number): InputEvent[] {
    const out: InputEvent[] = [];
    if (!focused) {
      for (const key of this.heldKeys) {
        out.push(this.emit({ kind: "key-up", key, repeat: false, modifiers: NO_MODIFIERS, timestampMs }));
        this.stats.synthesizedReleases += 1;
      }
      this.heldKeys.clear();
      for (const button of this.heldButtons) {
        out.push(
          this.emit({
            kind: "pointer-button",
            button,
            pressed: false,
            x: this.pointerX,
            y: this.pointerY,
            modifiers: NO_MODIFIERS,
            timestampMs,
          }),
        );
        this.stats.synthesizedReleases += 1;
      }
      this.heldButtons.clear();
    }
    out.push(this.emit({ kind: "focus-change", focused, timestampMs }));
    return out;
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

function freezeModifiers(m: Modifiers): Modifiers {
  return Object.freeze({ shift: m.shift, ctrl: m.ctrl, alt: m.alt, meta: m.meta });
}
