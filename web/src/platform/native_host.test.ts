import { describe, expect, it } from "vitest";

import { MemorySystemClipboard } from "../clipboard/system_clipboard_bridge";
import type { DrawCommand, TextMetrics, Viewport } from "../display/draw";
import { NO_MODIFIERS, type RawInput } from "../input/types";
import { ManualTickSource } from "../test_utils/fake_host";
import { NativeHostAdapter, type NativeWindow } from "./native_host";

class FakeWindow implements NativeWindow {
  readonly textMetrics: TextMetrics = { charWidth: 1, lineHeight: 1 };
  raw: RawInput[] = [];
  readonly presented: Array<{ commands: readonly DrawCommand[]; viewport: Viewport }> = [];
  closed = 0;

  pollRawEvents(): RawInput[] {
    const out = this.raw;
    this.raw = [];
    return out;
  }

  present(commands: readonly DrawCommand[], viewport: Viewport): void {
    this.presented.push({ commands, viewport });
  }

  size(): { width: number; height: number } {
    return { width: 80, height: 24 };
  }

  scaleFactor(): number {
    return 1;
  }

  close(): void {
    this.closed += 1;
  }
}

describe("platform/NativeHostAdapter", () => {
  it("translates HID usages from the window into logical keys", () => {
    const window = new FakeWindow();
    const host = new NativeHostAdapter({ window, clipboard: null, speech: null, ticks: new ManualTickSource() });
    window.raw.push(
      { type: "key", scanCode: 4, pressed: true, modifiers: NO_MODIFIERS, timestampMs: 1 },
      { type: "key", scanCode: 4, pressed: false, modifiers: NO_MODIFIERS, timestampMs: 2 },
      { type: "pointer-button", button: 3, pressed: true, x: 5, y: 6, timestampMs: 3 },
    );

    expect(host.pollEvents()).toEqual([
      { kind: "key-down", key: "KeyA", repeat: false, modifiers: NO_MODIFIERS, seq: 1, timestampMs: 1 },
      { kind: "key-up", key: "KeyA", repeat: false, modifiers: NO_MODIFIERS, seq: 2, timestampMs: 2 },
      { kind: "pointer-button", button: "secondary", pressed: true, x: 5, y: 6, modifiers: NO_MODIFIERS, seq: 3, timestampMs: 3 },
    ]);
    expect(host.pollEvents()).toEqual([]);
  });

  it("describes what it can do in a frozen descriptor", () => {
    const host = new NativeHostAdapter({
      window: new FakeWindow(),
      clipboard: new MemorySystemClipboard(),
      speech: { speak: () => Promise.resolve(), cancel: () => {} },
      ticks: new ManualTickSource(),
    });
    const caps = host.capabilities();
    expect(caps).toEqual({
      host: "native",
      clipboard: true,
      clipboardBinary: true,
      clipboardPermissionGated: false,
      accessibility: true,
      resizeEvents: true,
    });
    expect(Object.isFrozen(caps)).toBe(true);
    expect(host.capabilities()).toBe(caps);
  });

  it("settles clipboard requests synchronously", () => {
    const host = new NativeHostAdapter({
      window: new FakeWindow(),
      clipboard: new MemorySystemClipboard(),
      speech: null,
      ticks: new ManualTickSource(),
    });
    host.clipboard.request({ op: "write", payload: { kind: "text", text: "1 KiB" } }, 1);
    expect(host.clipboard.request({ op: "read" }, 2)).toEqual({
      state: "settled",
      outcome: { status: "ok", op: "read", payload: { kind: "text", text: "1 KiB" } },
    });
  });

  it("presents with the current viewport", () => {
    const window = new FakeWindow();
    const host = new NativeHostAdapter({ window, clipboard: null, speech: null, scaleFactorOverride: 2, ticks: new ManualTickSource() });
    host.presentFrame([{ kind: "clear" }]);
    expect(window.presented[0]?.viewport).toEqual({
      width: 40,
      height: 12,
      scaleFactor: 2,
      text: { charWidth: 1, lineHeight: 1 },
    });
  });

  it("closes once and turns the bridges off", () => {
    const window = new FakeWindow();
    const ticks = new ManualTickSource();
    const host = new NativeHostAdapter({ window, clipboard: new MemorySystemClipboard(), speech: null, ticks });
    ticks.start(() => {});
    host.close();
    host.close();

    expect(window.closed).toBe(1);
    expect(ticks.running).toBe(false);
    expect(host.clipboard.request({ op: "read" }, 1)).toEqual({
      state: "settled",
      outcome: { status: "unavailable", message: "Clipboard bridge is closed." },
    });
  });
});
