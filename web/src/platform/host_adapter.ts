import type { AccessibilityBridge } from "../a11y/types";
import type { ClipboardBridge } from "../clipboard/types";
import type { DrawCommand, Viewport } from "../display/draw";
import type { InputEvent } from "../input/types";
import type { NotificationMailbox } from "../main/notifications";
import type { TickSource } from "./tick_source";

export type HostKind = "native" | "browser";

/** What the running host can do. Computed once at startup and shared by reference. */
export interface HostCapabilities {
  readonly host: HostKind;
  readonly clipboard: boolean;
  readonly clipboardBinary: boolean;
  /** Clipboard access may be refused by a permission prompt. */
  readonly clipboardPermissionGated: boolean;
  readonly accessibility: boolean;
  readonly resizeEvents: boolean;
}

export function defineHostCapabilities(capabilities: HostCapabilities): HostCapabilities {
  return Object.freeze({ ...capabilities });
}

/**
 * One host (native window or browser page) as the frame driver sees it.
 * The entry point picks the implementation; nothing downstream inspects which.
 */
export interface HostAdapter {
  readonly clipboard: ClipboardBridge;
  readonly accessibility: AccessibilityBridge;
  readonly ticks: TickSource;
  /** Outcomes of host work, picked up at the start of the next frame. */
  readonly notifications: NotificationMailbox;

  /** Events since the last poll, oldest first. Never blocks. */
  pollEvents(): readonly InputEvent[];
  /** Throws `PresentationError` once the surface is gone. */
  presentFrame(commands: readonly DrawCommand[]): void;
  capabilities(): HostCapabilities;
  viewport(): Viewport;
  /** Stops ticks, disposes the bridges and releases host resources. Idempotent. */
  close(): void;
}
