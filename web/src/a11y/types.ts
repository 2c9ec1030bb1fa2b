import { formatOneLineUtf8 } from "../text";

export type AnnouncementPriority = "polite" | "assertive";

export interface Announcement {
  readonly text: string;
  readonly priority: AnnouncementPriority;
}

export interface AccessibilityDiagnostics {
  announced: number;
  /** Announcements lost to a speech or live-region failure. */
  failed: number;
}

export interface AccessibilityBridge {
  /** Never throws; failures only show up in {@link diagnostics}. */
  announce(announcement: Announcement): void;
  diagnostics(): AccessibilityDiagnostics;
  dispose(): void;
}

export const MAX_ANNOUNCEMENT_BYTES = 512;

/** One line, at most {@link MAX_ANNOUNCEMENT_BYTES} of UTF-8. `null` when nothing is left to say. */
export function sanitizeAnnouncement(announcement: Announcement): Announcement | null {
  const text = formatOneLineUtf8(announcement.text, MAX_ANNOUNCEMENT_BYTES);
  if (text === "") return null;
  return { text, priority: announcement.priority === "assertive" ? "assertive" : "polite" };
}

export class SilentAnnouncer implements AccessibilityBridge {
  private dropped = 0;

  announce(_announcement: Announcement): void {
    this.dropped += 1;
  }

  diagnostics(): AccessibilityDiagnostics {
    return { announced: 0, failed: this.dropped };
  }

  dispose(): void {}
}
