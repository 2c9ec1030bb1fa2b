import keymap from "./keymap.json";

/**
 * Resolves host key codes to logical keys. Logical keys use the DOM
 * `KeyboardEvent.code` vocabulary on every host so UI logic can match on
 * `"KeyA"` or `"Enter"` without knowing where the event came from.
 */
export interface KeyboardLayout {
  readonly name: string;
  /** USB HID usage (Keyboard/Keypad page 0x07) to logical key. */
  resolveScanCode(usage: number): string | null;
  /** Browser `KeyboardEvent.code` to logical key. */
  resolveCode(code: string): string | null;
}

type KeymapJson = {
  name: string;
  usages: Record<string, string>;
  aliases: Record<string, string>;
};

export class TableKeyboardLayout implements KeyboardLayout {
  readonly name: string;
  private readonly byUsage = new Map<number, string>();
  private readonly byCode = new Map<string, string>();

  constructor(table: KeymapJson) {
    this.name = table.name;
    for (const [usage, code] of Object.entries(table.usages)) {
      const n = Number.parseInt(usage, 10);
      if (!Number.isInteger(n)) continue;
      this.byUsage.set(n, code);
      this.byCode.set(code, code);
    }
    // Some browsers still report legacy names for a few physical keys.
    for (const [alias, code] of Object.entries(table.aliases)) {
      if (this.byCode.has(code)) this.byCode.set(alias, code);
    }
  }

  resolveScanCode(usage: number): string | null {
    return this.byUsage.get(usage) ?? null;
  }

  resolveCode(code: string): string | null {
    return this.byCode.get(code) ?? null;
  }
}

export const US_KEYBOARD_LAYOUT: KeyboardLayout = new TableKeyboardLayout(keymap);

export function isModifierKey(key: string): boolean {
  switch (key) {
    case "ShiftLeft":
    case "ShiftRight":
    case "ControlLeft":
    case "ControlRight":
    case "AltLeft":
    case "AltRight":
    case "MetaLeft":
    case "MetaRight":
      return true;
    default:
      return false;
  }
}
