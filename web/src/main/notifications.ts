import type { ClipboardOutcome, RequestToken } from "../clipboard/types";

export interface ClipboardNotification {
  readonly kind: "clipboard";
  readonly token: RequestToken;
  readonly op: "read" | "write";
  readonly outcome: ClipboardOutcome;
}

export type HostNotification = ClipboardNotification;

export type NotificationSink = (notification: HostNotification) => void;

/**
 * Holds outcomes of host work (clipboard promises, synchronous clipboard
 * replies) until the next frame picks them up.
 */
export class NotificationMailbox {
  private items: HostNotification[] = [];
  private closed = false;
  private discardedCount = 0;

  readonly post: NotificationSink = (notification) => {
    if (this.closed) {
      this.discardedCount += 1;
      return;
    }
    this.items.push(Object.freeze(notification));
  };

  drain(): HostNotification[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  get size(): number {
    return this.items.length;
  }

  /** Notifications posted after close were never delivered. */
  get discarded(): number {
    return this.discardedCount;
  }

  close(): void {
    this.closed = true;
    this.discardedCount += this.items.length;
    this.items = [];
  }
}
