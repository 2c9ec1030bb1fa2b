import type { AccessibilityBridge, AccessibilityDiagnostics, Announcement } from "../a11y/types";
import { MemorySystemClipboard, SystemClipboardBridge } from "../clipboard/system_clipboard_bridge";
import type { ClipboardBridge } from "../clipboard/types";
import type { DrawCommand, Viewport } from "../display/draw";
import type { InputEvent } from "../input/types";
import { NotificationMailbox, type NotificationSink } from "../main/notifications";
import { defineHostCapabilities, type HostAdapter, type HostCapabilities } from "../platform/host_adapter";
import type { TickCallback, TickSource } from "../platform/tick_source";

export class ManualTickSource implements TickSource {
  private callback: TickCallback | null = null;
  starts = 0;

  get running(): boolean {
    return this.callback !== null;
  }

  start(onTick: TickCallback): void {
    this.starts += 1;
    this.callback = onTick;
  }

  stop(): void {
    this.callback = null;
  }

  /** Fires one tick; returns false when nothing is registered. */
  fire(nowMs: number): boolean {
    const callback = this.callback;
    if (!callback) return false;
    callback(nowMs);
    return true;
  }
}

export class RecordingAnnouncer implements AccessibilityBridge {
  readonly announced: Announcement[] = [];

  announce(announcement: Announcement): void {
    this.announced.push(announcement);
  }

  diagnostics(): AccessibilityDiagnostics {
    return { announced: this.announced.length, failed: 0 };
  }

  dispose(): void {}
}

export const TEST_VIEWPORT: Viewport = Object.freeze({
  width: 80,
  height: 24,
  scaleFactor: 1,
  text: Object.freeze({ charWidth: 1, lineHeight: 1 }),
});

export class FakeHost implements HostAdapter {
  readonly notifications = new NotificationMailbox();
  readonly ticks = new ManualTickSource();
  readonly accessibility = new RecordingAnnouncer();
  readonly clipboard: ClipboardBridge;
  readonly presented: Array<readonly DrawCommand[]> = [];
  private readonly caps: HostCapabilities;
  private pending: InputEvent[] = [];
  presentError: unknown = null;
  closed = false;

  constructor(
    options: { clipboard?: (notify: NotificationSink) => ClipboardBridge; capabilities?: Partial<HostCapabilities> } = {},
  ) {
    this.clipboard = options.clipboard?.(this.notifications.post) ?? new SystemClipboardBridge(new MemorySystemClipboard());
    this.caps = defineHostCapabilities({
      host: "native",
      clipboard: true,
      clipboardBinary: true,
      clipboardPermissionGated: false,
      accessibility: true,
      resizeEvents: true,
      ...options.capabilities,
    });
  }

  queue(...events: InputEvent[]): void {
    this.pending.push(...events);
  }

  pollEvents(): readonly InputEvent[] {
    const out = this.pending;
    this.pending = [];
    return out;
  }

  presentFrame(commands: readonly DrawCommand[]): void {
    if (this.presentError !== null) throw this.presentError;
    this.presented.push(commands);
  }

  capabilities(): HostCapabilities {
    return this.caps;
  }

  viewport(): Viewport {
    return TEST_VIEWPORT;
  }

  close(): void {
    this.closed = true;
    this.ticks.stop();
  }
}
