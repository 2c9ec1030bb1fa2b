import { describe, expect, it } from "vitest";

import { ClipboardError } from "../errors/host_errors";
import { NotificationMailbox } from "../main/notifications";
import { AsyncClipboardBridge, UnavailableClipboardBridge, type AsyncClipboard } from "./async_clipboard_bridge";
import { MemorySystemClipboard, SystemClipboardBridge, type SystemClipboard } from "./system_clipboard_bridge";

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("clipboard/SystemClipboardBridge", () => {
  it("returns what was written", () => {
    const bridge = new SystemClipboardBridge(new MemorySystemClipboard());
    expect(bridge.request({ op: "write", payload: { kind: "text", text: "hello" } }, 1)).toEqual({
      state: "settled",
      outcome: { status: "ok", op: "write" },
    });
    expect(bridge.request({ op: "read" }, 2)).toEqual({
      state: "settled",
      outcome: { status: "ok", op: "read", payload: { kind: "text", text: "hello" } },
    });
  });

  it("round-trips binary payloads by value", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const bridge = new SystemClipboardBridge(new MemorySystemClipboard());
    bridge.request({ op: "write", payload: { kind: "bytes", mimeType: "image/png", bytes } }, 1);
    bytes[0] = 9;
    const reply = bridge.request({ op: "read" }, 2);
    expect(reply).toEqual({
      state: "settled",
      outcome: { status: "ok", op: "read", payload: { kind: "bytes", mimeType: "image/png", bytes: new Uint8Array([1, 2, 3]) } },
    });
  });

  it("reads an empty clipboard as empty text", () => {
    const bridge = new SystemClipboardBridge(new MemorySystemClipboard());
    expect(bridge.request({ op: "read" }, 1)).toEqual({
      state: "settled",
      outcome: { status: "ok", op: "read", payload: { kind: "text", text: "" } },
    });
  });

  it("maps clipboard errors to outcomes", () => {
    const denied: SystemClipboard = {
      supportsBinary: false,
      read: () => {
        throw new ClipboardError("clipboard_permission_denied", "Locked by policy.");
      },
      write: () => {
        throw new Error("No display.");
      },
    };
    const bridge = new SystemClipboardBridge(denied);
    expect(bridge.request({ op: "read" }, 1)).toEqual({
      state: "settled",
      outcome: { status: "permission-denied", message: "Locked by policy." },
    });
    expect(bridge.request({ op: "write", payload: { kind: "text", text: "x" } }, 2)).toEqual({
      state: "settled",
      outcome: { status: "unavailable", message: "No display." },
    });
    expect(bridge.request({ op: "write", payload: { kind: "bytes", mimeType: "image/png", bytes: new Uint8Array(1) } }, 3)).toEqual({
      state: "settled",
      outcome: { status: "unavailable", message: "Clipboard cannot hold image/png data." },
    });
  });
});

describe("clipboard/AsyncClipboardBridge", () => {
  function fakeClipboard(overrides: Partial<AsyncClipboard> = {}): AsyncClipboard & { text: string } {
    const state: AsyncClipboard & { text: string } = {
      text: "",
      readText: () => Promise.resolve(state.text),
      writeText: (text: string) => {
        state.text = text;
        return Promise.resolve();
      },
      ...overrides,
    };
    return state;
  }

  it("replies pending and posts the outcome when the promise settles", async () => {
    const mailbox = new NotificationMailbox();
    const clipboard = fakeClipboard();
    const bridge = new AsyncClipboardBridge({ clipboard, notify: mailbox.post, createItem: null });

    expect(bridge.request({ op: "write", payload: { kind: "text", text: "copied" } }, 7)).toEqual({ state: "pending" });
    expect(mailbox.size).toBe(0);
    expect(bridge.inFlight).toBe(1);

    await flushPromises();
    expect(clipboard.text).toBe("copied");
    expect(bridge.inFlight).toBe(0);
    expect(mailbox.drain()).toEqual([{ kind: "clipboard", token: 7, op: "write", outcome: { status: "ok", op: "write" } }]);
  });

  it("maps NotAllowedError to permission-denied", async () => {
    const mailbox = new NotificationMailbox();
    const clipboard = fakeClipboard({
      readText: () => Promise.reject(new DOMException("Read permission denied.", "NotAllowedError")),
    });
    const bridge = new AsyncClipboardBridge({ clipboard, notify: mailbox.post, createItem: null });

    bridge.request({ op: "read" }, 3);
    await flushPromises();
    expect(mailbox.drain()).toEqual([
      { kind: "clipboard", token: 3, op: "read", outcome: { status: "permission-denied", message: "Read permission denied." } },
    ]);
  });

  it("maps other failures to unavailable", async () => {
    const mailbox = new NotificationMailbox();
    const clipboard = fakeClipboard({ writeText: () => Promise.reject(new TypeError("Document is not focused.")) });
    const bridge = new AsyncClipboardBridge({ clipboard, notify: mailbox.post, createItem: null });

    bridge.request({ op: "write", payload: { kind: "text", text: "x" } }, 1);
    bridge.request({ op: "write", payload: { kind: "bytes", mimeType: "image/png", bytes: new Uint8Array(2) } }, 2);
    await flushPromises();
    const outcomes = mailbox
      .drain()
      .sort((a, b) => a.token - b.token)
      .map((n) => n.outcome);
    expect(outcomes).toEqual([
      { status: "unavailable", message: "Document is not focused." },
      { status: "unavailable", message: "Clipboard cannot hold image/png data." },
    ]);
  });

  it("reads text from ClipboardItems when read() exists", async () => {
    const mailbox = new NotificationMailbox();
    const clipboard = fakeClipboard({
      read: () =>
        Promise.resolve([
          { types: ["text/html", "text/plain"], getType: () => Promise.resolve(new Blob(["from item"])) },
        ]),
    });
    const bridge = new AsyncClipboardBridge({ clipboard, notify: mailbox.post, createItem: null });

    bridge.request({ op: "read" }, 1);
    await flushPromises();
    expect(mailbox.drain()[0]?.outcome).toEqual({ status: "ok", op: "read", payload: { kind: "text", text: "from item" } });
  });

  it("discards outcomes that arrive after dispose", async () => {
    const mailbox = new NotificationMailbox();
    const bridge = new AsyncClipboardBridge({ clipboard: fakeClipboard(), notify: mailbox.post, createItem: null });

    bridge.request({ op: "read" }, 1);
    bridge.dispose();
    await flushPromises();
    expect(mailbox.size).toBe(0);
    expect(bridge.discarded).toBe(1);
    expect(bridge.request({ op: "read" }, 2)).toEqual({
      state: "settled",
      outcome: { status: "unavailable", message: "Clipboard bridge is closed." },
    });
  });
});

describe("clipboard/UnavailableClipboardBridge", () => {
  it("settles every request as unavailable", () => {
    const bridge = new UnavailableClipboardBridge("Built without clipboard support.");
    expect(bridge.request({ op: "read" }, 1)).toEqual({
      state: "settled",
      outcome: { status: "unavailable", message: "Built without clipboard support." },
    });
  });
});
