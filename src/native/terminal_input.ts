import type { Modifiers, RawInput } from "../../web/src/input/types";

const ESC = "\x1b";

// USB HID usages (Keyboard/Keypad page) for the keys a terminal can report.
const USAGE_A = 4;
const USAGE_1 = 30;
const USAGE_0 = 39;
const USAGE_ENTER = 40;
const USAGE_ESCAPE = 41;
const USAGE_BACKSPACE = 42;
const USAGE_TAB = 43;
const USAGE_SPACE = 44;
const USAGE_F1 = 58;

const CSI_FINAL_USAGES: Readonly<Record<string, number>> = {
  A: 82, // ArrowUp
  B: 81, // ArrowDown
  C: 79, // ArrowRight
  D: 80, // ArrowLeft
  H: 74, // Home
  F: 77, // End
  P: USAGE_F1,
  Q: USAGE_F1 + 1,
  R: USAGE_F1 + 2,
  S: USAGE_F1 + 3,
};

// `CSI <n> ~` keys.
const TILDE_USAGES: Readonly<Record<string, number>> = {
  "1": 74,
  "2": 73,
  "3": 76,
  "4": 77,
  "5": 75,
  "6": 78,
  "7": 74,
  "8": 77,
  "11": USAGE_F1,
  "12": USAGE_F1 + 1,
  "13": USAGE_F1 + 2,
  "14": USAGE_F1 + 3,
  "15": USAGE_F1 + 4,
  "17": USAGE_F1 + 5,
  "18": USAGE_F1 + 6,
  "19": USAGE_F1 + 7,
  "20": USAGE_F1 + 8,
  "21": USAGE_F1 + 9,
  "23": USAGE_F1 + 10,
  "24": USAGE_F1 + 11,
};

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI = /^\x1b\[([0-9;]*)([A-Za-z~])/;
const SS3 = /^\x1bO([A-DFHPQRS])/;
// Anything that could still grow into one of the above.
const INCOMPLETE = /^\x1b(\[[<0-9;]*|O)?$/;

function modifiers(shift: boolean, alt: boolean, ctrl: boolean, meta = false): Modifiers {
  return Object.freeze({ shift, ctrl, alt, meta });
}

const NONE = modifiers(false, false, false);

/** xterm modifier parameter: 1 + (shift | alt << 1 | ctrl << 2 | meta << 3). */
function csiModifiers(param: string | undefined): Modifiers {
  const bits = Number.parseInt(param ?? "1", 10) - 1;
  if (!Number.isInteger(bits) || bits <= 0) return NONE;
  return modifiers((bits & 1) !== 0, (bits & 2) !== 0, (bits & 4) !== 0, (bits & 8) !== 0);
}

export interface TerminalDecoderDiagnostics {
  unrecognized: number;
}

type Tap = (usage: number, mods: Modifiers) => void;

function tapper(out: RawInput[], timestampMs: number): Tap {
  return (usage, mods) => {
    out.push({ type: "key", scanCode: usage, pressed: true, modifiers: mods, timestampMs });
    out.push({ type: "key", scanCode: usage, pressed: false, modifiers: mods, timestampMs });
  };
}

/** HID usage of a printable ASCII character, when it names a letter, digit or space. */
export function usageForChar(ch: string): { usage: number; shift: boolean } | null {
  if (ch >= "a" && ch <= "z") return { usage: USAGE_A + ch.charCodeAt(0) - 97, shift: false };
  if (ch >= "A" && ch <= "Z") return { usage: USAGE_A + ch.charCodeAt(0) - 65, shift: true };
  if (ch === "0") return { usage: USAGE_0, shift: false };
  if (ch >= "1" && ch <= "9") return { usage: USAGE_1 + ch.charCodeAt(0) - 49, shift: false };
  if (ch === " ") return { usage: USAGE_SPACE, shift: false };
  return null;
}

/**
 * Turns the byte stream of a terminal in raw mode (with SGR mouse reporting
 * and focus reporting on) into raw host input. Positions are reported in
 * cells, 0-based.
 *
 * Terminals only report key presses, so every key becomes a press followed
 * by its release.
 */
export class TerminalInputDecoder {
  private buffer = "";
  private unrecognized = 0;

  decode(chunk: string, timestampMs: number): RawInput[] {
    const out: RawInput[] = [];
    let rest = this.buffer + chunk;
    this.buffer = "";
    const tap = tapper(out, timestampMs);

    while (rest.length > 0) {
      if (rest.startsWith(ESC)) {
        const consumed = this.decodeEscape(rest, out, tap, timestampMs);
        if (consumed === 0) {
          // Partial sequence; wait for the rest of it.
          this.buffer = rest;
          break;
        }
        rest = rest.slice(consumed);
        continue;
      }

      const ch = String.fromCodePoint(rest.codePointAt(0) ?? 0);
      rest = rest.slice(ch.length);
      this.decodeChar(ch, out, tap, timestampMs, false);
    }
    return out;
  }

  /**
   * Resolves a sequence still buffered when input went quiet: the ESC was the
   * Escape key, and whatever followed it is typed text.
   */
  flush(timestampMs: number): RawInput[] {
    const held = this.buffer;
    this.buffer = "";
    if (held === "") return [];
    const out: RawInput[] = [];
    const tap = tapper(out, timestampMs);
    tap(USAGE_ESCAPE, NONE);
    for (const ch of held.slice(1)) this.decodeChar(ch, out, tap, timestampMs, false);
    return out;
  }

  get pending(): boolean {
    return this.buffer !== "";
  }

  /** Complete escape sequences that map to no input (bracketed paste markers, unknown keys). */
  diagnostics(): TerminalDecoderDiagnostics {
    return { unrecognized: this.unrecognized };
  }

  private decodeEscape(
    rest: string,
    out: RawInput[],
    tap: Tap,
    timestampMs: number,
  ): number {
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse) {
      decodeSgrMouse(Number(mouse[1]), Number(mouse[2]), Number(mouse[3]), mouse[4] === "M", out, timestampMs);
      return mouse[0].length;
    }

    const csi = CSI.exec(rest);
    if (csi) {
      const params = (csi[1] ?? "").split(";");
      const final = csi[2] ?? "";
      if (final === "I" || final === "O") {
        out.push({ type: "focus", focused: final === "I", timestampMs });
      } else if (final === "~") {
        const usage = TILDE_USAGES[params[0] ?? ""];
        if (usage !== undefined) tap(usage, csiModifiers(params[1]));
        else this.unrecognized += 1;
      } else if (final === "Z") {
        tap(USAGE_TAB, modifiers(true, false, false));
      } else {
        const usage = CSI_FINAL_USAGES[final];
        if (usage !== undefined) tap(usage, csiModifiers(params[1]));
        else this.unrecognized += 1;
      }
      return csi[0].length;
    }

    const ss3 = SS3.exec(rest);
    if (ss3) {
      const usage = CSI_FINAL_USAGES[ss3[1] ?? ""];
      if (usage !== undefined) tap(usage, NONE);
      return ss3[0].length;
    }

    if (INCOMPLETE.test(rest)) return 0;

    if (rest[1] === ESC) {
      tap(USAGE_ESCAPE, NONE);
      return 1;
    }

    // ESC + key is Alt + key.
    const ch = String.fromCodePoint(rest.codePointAt(1) ?? 0);
    this.decodeChar(ch, out, tap, timestampMs, true);
    return 1 + ch.length;
  }

  private decodeChar(
    ch: string,
    out: RawInput[],
    tap: Tap,
    timestampMs: number,
    alt: boolean,
  ): void {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\r" || ch === "\n") {
      tap(USAGE_ENTER, modifiers(false, alt, false));
      return;
    }
    if (ch === "\t") {
      tap(USAGE_TAB, modifiers(false, alt, false));
      return;
    }
    if (code === 0x7f || code === 0x08) {
      tap(USAGE_BACKSPACE, modifiers(false, alt, false));
      return;
    }
    if (code === 0) {
      tap(USAGE_SPACE, modifiers(false, alt, true));
      return;
    }
    if (code >= 0x01 && code <= 0x1a) {
      // Ctrl+A .. Ctrl+Z
      tap(USAGE_A + code - 1, modifiers(false, alt, true));
      return;
    }
    if (code < 0x20) return;

    const key = usageForChar(ch);
    if (key) tap(key.usage, modifiers(key.shift, alt, false));
    if (!alt) out.push({ type: "text", text: ch, timestampMs });
  }
}

/**
 * SGR (mode 1006) mouse report: `cb` carries the button in its low two bits,
 * modifiers in 4/8/16, motion in 32 and the wheel in 64. Buttons are mapped to
 * X11 numbering (1 left, 2 middle, 3 right).
 */
function decodeSgrMouse(cb: number, col: number, row: number, press: boolean, out: RawInput[], timestampMs: number): void {
  const x = Math.max(0, col - 1);
  const y = Math.max(0, row - 1);
  const mods = modifiers((cb & 4) !== 0, (cb & 8) !== 0, (cb & 16) !== 0);
  const low = cb & 3;

  if ((cb & 64) !== 0) {
    if (!press) return;
    const dx = low === 2 ? -1 : low === 3 ? 1 : 0;
    const dy = low === 0 ? -1 : low === 1 ? 1 : 0;
    out.push({ type: "scroll", dx, dy, unit: "line", timestampMs });
    return;
  }
  if ((cb & 32) !== 0) {
    out.push({ type: "pointer-move", x, y, timestampMs });
    return;
  }
  if (low === 3) return;
  out.push({ type: "pointer-button", button: low + 1, pressed: press, x, y, modifiers: mods, timestampMs });
}
