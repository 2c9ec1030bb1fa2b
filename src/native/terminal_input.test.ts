import { describe, expect, it } from "vitest";

import type { Modifiers, RawInput } from "../../web/src/input/types";
import { TerminalInputDecoder, usageForChar } from "./terminal_input";

function modText(m: Modifiers): string {
  const parts: string[] = [];
  if (m.ctrl) parts.push("ctrl");
  if (m.shift) parts.push("shift");
  if (m.alt) parts.push("alt");
  if (m.meta) parts.push("meta");
  return parts.length > 0 ? ` ${parts.join("+")}` : "";
}

function summarize(events: readonly RawInput[]): string[] {
  return events.map((e) => {
    switch (e.type) {
      case "key":
        return `${e.pressed ? "+" : "-"}${String(e.scanCode)}${modText(e.modifiers)}`;
      case "text":
        return `text ${e.text}`;
      case "pointer-button":
        return `button ${e.button} ${e.pressed ? "down" : "up"} ${e.x},${e.y}`;
      case "pointer-move":
        return `move ${e.x},${e.y}`;
      case "scroll":
        return `scroll ${e.dx},${e.dy} ${e.unit}`;
      case "focus":
        return `focus ${String(e.focused)}`;
      case "resize":
        return `resize ${e.width}x${e.height}`;
    }
  });
}

describe("native/terminal_input", () => {
  it("maps letters, digits and space to HID usages", () => {
    expect(usageForChar("a")).toEqual({ usage: 4, shift: false });
    expect(usageForChar("Q")).toEqual({ usage: 20, shift: true });
    expect(usageForChar("1")).toEqual({ usage: 30, shift: false });
    expect(usageForChar("0")).toEqual({ usage: 39, shift: false });
    expect(usageForChar(" ")).toEqual({ usage: 44, shift: false });
    expect(usageForChar("/")).toBeNull();
  });

  it("reports typed characters as a key tap plus text", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("aB/", 0))).toEqual(["+4", "-4", "text a", "+5 shift", "-5 shift", "text B", "text /"]);
  });

  it("decodes control characters", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x03\r\x7f\t\x11", 0))).toEqual([
      "+6 ctrl",
      "-6 ctrl",
      "+40",
      "-40",
      "+42",
      "-42",
      "+43",
      "-43",
      "+20 ctrl",
      "-20 ctrl",
    ]);
  });

  it("decodes cursor, editing and function keys", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x1b[A\x1b[1;5C\x1b[3~\x1bOP\x1b[Z", 0))).toEqual([
      "+82",
      "-82",
      "+79 ctrl",
      "-79 ctrl",
      "+76",
      "-76",
      "+58",
      "-58",
      "+43 shift",
      "-43 shift",
    ]);
  });

  it("decodes SGR mouse reports into 0-based cells", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x1b[<0;10;5M\x1b[<0;10;5m\x1b[<32;11;5M\x1b[<65;1;1M\x1b[<2;1;1M", 0))).toEqual([
      "button 1 down 9,4",
      "button 1 up 9,4",
      "move 10,4",
      "scroll 0,1 line",
      "button 3 down 0,0",
    ]);
  });

  it("decodes focus reports", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x1b[I\x1b[O", 0))).toEqual(["focus true", "focus false"]);
  });

  it("waits for the rest of a sequence split across reads", () => {
    const decoder = new TerminalInputDecoder();
    expect(decoder.decode("\x1b[<0;3", 1)).toEqual([]);
    expect(decoder.pending).toBe(true);
    expect(summarize(decoder.decode(";2M", 2))).toEqual(["button 1 down 2,1"]);
    expect(decoder.pending).toBe(false);
  });

  it("turns a lone ESC into the Escape key once flushed", () => {
    const decoder = new TerminalInputDecoder();
    expect(decoder.decode("\x1b", 1)).toEqual([]);
    expect(summarize(decoder.flush(5))).toEqual(["+41", "-41"]);
    expect(decoder.flush(6)).toEqual([]);
  });

  it("counts complete sequences that map to no key", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x1b[200~hi\x1b[201~\x1b[99~\x1b[A", 0))).toEqual([
      "+11",
      "-11",
      "text h",
      "+12",
      "-12",
      "text i",
      "+82",
      "-82",
    ]);
    expect(decoder.diagnostics()).toEqual({ unrecognized: 3 });
  });

  it("reads ESC before a character as Alt", () => {
    const decoder = new TerminalInputDecoder();
    expect(summarize(decoder.decode("\x1bx", 0))).toEqual(["+27 alt", "-27 alt"]);
  });
});
