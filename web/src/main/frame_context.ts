import type { HostCapabilities } from "../platform/host_adapter";
import type { ClipboardPayload, ClipboardRequest, RequestToken } from "../clipboard/types";
import type { Announcement, AnnouncementPriority } from "../a11y/types";
import type { DrawCommand, Viewport } from "../display/draw";
import type { InputEvent, Modifiers } from "../input/types";
import type { HostNotification } from "./notifications";

/** Everything the UI logic sees for one frame. Frozen, and never reused. */
export interface FrameContext {
  readonly frameIndex: number;
  readonly events: readonly InputEvent[];
  readonly viewport: Viewport;
  /** Milliseconds since the previous frame; 0 on the first. */
  readonly dtMs: number;
  readonly modifiers: Modifiers;
  readonly notifications: readonly HostNotification[];
  readonly capabilities: HostCapabilities;
}

export interface PendingClipboardRequest {
  readonly token: RequestToken;
  readonly request: ClipboardRequest;
}

/** What the UI logic asks of the host during one frame. */
export class FrameOutput {
  private readonly drawn: DrawCommand[] = [];
  private readonly clipboard: PendingClipboardRequest[] = [];
  private readonly announced: Announcement[] = [];
  private close = false;

  constructor(private readonly allocateToken: () => RequestToken) {}

  draw(command: DrawCommand): void {
    this.drawn.push(command);
  }

  readClipboard(): RequestToken {
    return this.enqueueClipboard({ op: "read" });
  }

  writeClipboard(payload: ClipboardPayload): RequestToken {
    return this.enqueueClipboard({ op: "write", payload });
  }

  announce(text: string, priority: AnnouncementPriority = "polite"): void {
    this.announced.push({ text, priority });
  }

  requestClose(): void {
    this.close = true;
  }

  get commands(): readonly DrawCommand[] {
    return this.drawn;
  }

  get clipboardRequests(): readonly PendingClipboardRequest[] {
    return this.clipboard;
  }

  get announcements(): readonly Announcement[] {
    return this.announced;
  }

  get closeRequested(): boolean {
    return this.close;
  }

  private enqueueClipboard(request: ClipboardRequest): RequestToken {
    const token = this.allocateToken();
    this.clipboard.push({ token, request });
    return token;
  }
}
