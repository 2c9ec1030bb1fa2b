import { errorMessage } from "../errors/errorProps";
import { createLogger } from "../log";
import {
  sanitizeAnnouncement,
  type AccessibilityBridge,
  type AccessibilityDiagnostics,
  type Announcement,
  type AnnouncementPriority,
} from "./types";

const log = createLogger("a11y");

/** The part of an `aria-live` element the announcer writes to. */
export interface LiveRegionElement {
  textContent: string | null;
}

export type LiveRegions = Record<AnnouncementPriority, LiveRegionElement>;

// Screen readers skip a live region whose text did not change, so repeats
// alternate a trailing no-break space.
const REPEAT_MARKER = "\u00a0";

export class LiveRegionAnnouncer implements AccessibilityBridge {
  private readonly stats: AccessibilityDiagnostics = { announced: 0, failed: 0 };
  private disposed = false;

  constructor(private readonly regions: LiveRegions) {}

  announce(announcement: Announcement): void {
    if (this.disposed) return;
    const clean = sanitizeAnnouncement(announcement);
    if (!clean) return;

    const region = this.regions[clean.priority];
    try {
      region.textContent = region.textContent === clean.text ? clean.text + REPEAT_MARKER : clean.text;
      this.stats.announced += 1;
    } catch (err) {
      this.stats.failed += 1;
      log.warn(`Live region update failed: ${errorMessage(err)}`);
    }
  }

  diagnostics(): AccessibilityDiagnostics {
    return { ...this.stats };
  }

  dispose(): void {
    this.disposed = true;
  }
}

export function createLiveRegions(doc: Document, parent: HTMLElement): LiveRegions & { remove(): void } {
  const make = (priority: AnnouncementPriority): HTMLElement => {
    const el = doc.createElement("div");
    el.setAttribute("aria-live", priority);
    el.setAttribute("aria-atomic", "true");
    el.setAttribute("role", priority === "assertive" ? "alert" : "status");
    el.className = "framehost-live-region";
    // Visually hidden, still read by assistive technology.
    Object.assign(el.style, {
      position: "absolute",
      width: "1px",
      height: "1px",
      overflow: "hidden",
      clip: "rect(0 0 0 0)",
      whiteSpace: "nowrap",
    });
    parent.append(el);
    return el;
  };
  const polite = make("polite");
  const assertive = make("assertive");
  return {
    polite,
    assertive,
    remove: () => {
      polite.remove();
      assertive.remove();
    },
  };
}
