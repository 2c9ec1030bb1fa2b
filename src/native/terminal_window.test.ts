import { EventEmitter } from "node:events";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Viewport } from "../../web/src/display/draw";
import { PresentationError } from "../../web/src/errors/host_errors";
import { setLogSink } from "../../web/src/log";
import { ESCAPE_TIMEOUT_MS, TERMINAL_TEXT_METRICS, TerminalWindow } from "./terminal_window";

class FakeInput extends EventEmitter {
  readonly isTTY = true;
  readonly rawModes: boolean[] = [];
  paused = false;

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  setEncoding(): this {
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

class FakeScreen extends EventEmitter {
  writable = true;
  columns = 20;
  rows = 3;
  readonly written: string[] = [];

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }
}

const VIEWPORT: Viewport = { width: 20, height: 3, scaleFactor: 1, text: TERMINAL_TEXT_METRICS };

describe("native/terminal_window", () => {
  let input: FakeInput;
  let screen: FakeScreen;
  let now: number;

  beforeEach(() => {
    setLogSink(() => {});
    input = new FakeInput();
    screen = new FakeScreen();
    now = 0;
  });

  afterEach(() => {
    setLogSink(null);
  });

  function open(): TerminalWindow {
    return new TerminalWindow({ input, screen, now: () => now });
  }

  it("takes over the terminal and gives it back on close", () => {
    const window = open();
    expect(input.rawModes).toEqual([true]);
    expect(screen.written[0]).toContain("\x1b[?1049h");
    expect(screen.written[0]).toContain("\x1b[?1006h");

    window.close();
    window.close();
    expect(input.rawModes).toEqual([true, false]);
    expect(input.paused).toBe(true);
    expect(screen.written).toHaveLength(2);
    expect(screen.written[1]).toContain("\x1b[?1049l");
    expect(input.listenerCount("data")).toBe(0);
    expect(screen.listenerCount("resize")).toBe(0);
  });

  it("decodes stdin chunks into raw input", () => {
    const window = open();
    now = 7;
    input.emit("data", Buffer.from("q"));

    expect(window.pollRawEvents()).toEqual([
      { type: "key", scanCode: 20, pressed: true, modifiers: { shift: false, ctrl: false, alt: false, meta: false }, timestampMs: 7 },
      { type: "key", scanCode: 20, pressed: false, modifiers: { shift: false, ctrl: false, alt: false, meta: false }, timestampMs: 7 },
      { type: "text", text: "q", timestampMs: 7 },
    ]);
    expect(window.pollRawEvents()).toEqual([]);
  });

  it("exposes the decoder's count of unknown sequences", () => {
    const window = open();
    input.emit("data", "\x1b[99~");
    expect(window.pollRawEvents()).toEqual([]);
    expect(window.decoderDiagnostics()).toEqual({ unrecognized: 1 });
  });

  it("reports a lone ESC as Escape after a quiet period", () => {
    const window = open();
    input.emit("data", "\x1b");
    now = ESCAPE_TIMEOUT_MS - 1;
    expect(window.pollRawEvents()).toEqual([]);

    now = ESCAPE_TIMEOUT_MS;
    expect(window.pollRawEvents().map((e) => (e.type === "key" ? `${String(e.scanCode)}:${String(e.pressed)}` : e.type))).toEqual([
      "41:true",
      "41:false",
    ]);
  });

  it("reports terminal resizes in cells", () => {
    const window = open();
    screen.columns = 30;
    now = 3;
    screen.emit("resize");

    expect(window.size()).toEqual({ width: 30, height: 3 });
    expect(window.pollRawEvents()).toEqual([{ type: "resize", width: 30, height: 3, scaleFactor: 1, timestampMs: 3 }]);
  });

  it("draws frames until the terminal goes away", () => {
    const window = open();
    window.present([{ kind: "text", x: 0, y: 0, text: "hi", style: "normal" }], VIEWPORT);
    expect(screen.written).toHaveLength(2);

    input.emit("end");
    expect(() => window.present([], VIEWPORT)).toThrow(PresentationError);
    expect(() => window.present([], VIEWPORT)).toThrow("Terminal input closed.");
  });
});
