import { AccessibilityUnavailableError } from "../errors/host_errors";
import { errorMessage } from "../errors/errorProps";
import { createLogger } from "../log";
import { sanitizeAnnouncement, type AccessibilityBridge, type AccessibilityDiagnostics, type Announcement } from "./types";

const log = createLogger("a11y");

export interface SpeechOptions {
  /** Stop whatever is being spoken first. */
  interrupt: boolean;
}

/** Platform text-to-speech. Rejections are reported to the announcer, not thrown at the UI. */
export interface SpeechSynthesizer {
  speak(text: string, options: SpeechOptions): Promise<void>;
  cancel(): void;
}

export class SpeechAnnouncer implements AccessibilityBridge {
  private readonly stats: AccessibilityDiagnostics = { announced: 0, failed: 0 };
  private disposed = false;
  private lastError: AccessibilityUnavailableError | null = null;

  constructor(private readonly synth: SpeechSynthesizer) {}

  announce(announcement: Announcement): void {
    if (this.disposed) return;
    const clean = sanitizeAnnouncement(announcement);
    if (!clean) return;

    let spoken: Promise<void>;
    try {
      spoken = this.synth.speak(clean.text, { interrupt: clean.priority === "assertive" });
    } catch (err) {
      this.fail(err);
      return;
    }
    this.stats.announced += 1;
    spoken.catch((err: unknown) => this.fail(err));
  }

  diagnostics(): AccessibilityDiagnostics {
    return { ...this.stats };
  }

  /** Most recent speech failure, if any. */
  get error(): AccessibilityUnavailableError | null {
    return this.lastError;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.synth.cancel();
  }

  private fail(err: unknown): void {
    this.stats.failed += 1;
    const first = this.lastError === null;
    this.lastError = new AccessibilityUnavailableError(`Speech failed: ${errorMessage(err)}`, { cause: err });
    // Only the first failure is worth a warning; a missing speech command fails every time.
    if (first) log.warn(this.lastError.message);
  }
}
