import { describe, expect, it } from "vitest";

import { ClipboardError } from "../../web/src/errors/host_errors";
import { TerminalClipboard, osc52 } from "./terminal_clipboard";

function recordingOutput(): { writable: boolean; chunks: string[]; write(chunk: string): boolean } {
  return {
    writable: true,
    chunks: [],
    write(chunk: string) {
      this.chunks.push(chunk);
      return true;
    },
  };
}

describe("native/terminal_clipboard", () => {
  it("encodes text as an OSC 52 clipboard write", () => {
    expect(osc52("hi")).toBe("\x1b]52;c;aGk=\x07");
  });

  it("sends writes to the terminal and reads back the last one", () => {
    const output = recordingOutput();
    const clipboard = new TerminalClipboard(output);
    expect(clipboard.read()).toBeNull();

    clipboard.write({ kind: "text", text: "hi" });
    expect(output.chunks).toEqual(["\x1b]52;c;aGk=\x07"]);
    expect(clipboard.read()).toEqual({ kind: "text", text: "hi" });
  });

  it("refuses binary data and a closed terminal", () => {
    const output = recordingOutput();
    const clipboard = new TerminalClipboard(output);
    expect(() => clipboard.write({ kind: "bytes", mimeType: "image/png", bytes: new Uint8Array([1]) })).toThrow(ClipboardError);

    output.writable = false;
    expect(() => clipboard.write({ kind: "text", text: "x" })).toThrow("Terminal output is closed.");
    expect(clipboard.read()).toBeNull();
  });

  it("keeps text locally without a terminal", () => {
    const clipboard = new TerminalClipboard(null);
    clipboard.write({ kind: "text", text: "local" });
    expect(clipboard.read()).toEqual({ kind: "text", text: "local" });
  });
});
