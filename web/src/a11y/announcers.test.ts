import { afterEach, describe, expect, it, vi } from "vitest";

import { setLogSink } from "../log";
import { LiveRegionAnnouncer, type LiveRegionElement } from "./live_region_announcer";
import { SpeechAnnouncer, type SpeechOptions, type SpeechSynthesizer } from "./speech_announcer";
import { MAX_ANNOUNCEMENT_BYTES, SilentAnnouncer, sanitizeAnnouncement } from "./types";

afterEach(() => {
  setLogSink(null);
});

class RecordingSynth implements SpeechSynthesizer {
  readonly spoken: Array<{ text: string; options: SpeechOptions }> = [];
  cancelled = 0;
  result: () => Promise<void> = () => Promise.resolve();

  speak(text: string, options: SpeechOptions): Promise<void> {
    this.spoken.push({ text, options });
    return this.result();
  }

  cancel(): void {
    this.cancelled += 1;
  }
}

describe("a11y/sanitizeAnnouncement", () => {
  it("flattens text to one line", () => {
    expect(sanitizeAnnouncement({ text: "Scan\nfinished:\t3 entries", priority: "polite" })).toEqual({
      text: "Scan finished: 3 entries",
      priority: "polite",
    });
  });

  it("drops announcements with nothing to say", () => {
    expect(sanitizeAnnouncement({ text: " \n ", priority: "assertive" })).toBeNull();
  });

  it("truncates long text", () => {
    const clean = sanitizeAnnouncement({ text: "x".repeat(MAX_ANNOUNCEMENT_BYTES + 10), priority: "polite" });
    expect(clean?.text.length).toBe(MAX_ANNOUNCEMENT_BYTES);
  });
});

describe("a11y/SpeechAnnouncer", () => {
  it("interrupts current speech only for assertive announcements", () => {
    const synth = new RecordingSynth();
    const announcer = new SpeechAnnouncer(synth);
    announcer.announce({ text: "Done", priority: "polite" });
    announcer.announce({ text: "On open root dir: /nope", priority: "assertive" });

    expect(synth.spoken).toEqual([
      { text: "Done", options: { interrupt: false } },
      { text: "On open root dir: /nope", options: { interrupt: true } },
    ]);
    expect(announcer.diagnostics()).toEqual({ announced: 2, failed: 0 });
  });

  it("counts rejected speech without throwing", async () => {
    const warn = vi.fn();
    setLogSink((level, line) => {
      if (level === "warn") warn(line);
    });
    const synth = new RecordingSynth();
    synth.result = () => Promise.reject(new Error("spawn espeak ENOENT"));
    const announcer = new SpeechAnnouncer(synth);

    announcer.announce({ text: "one", priority: "polite" });
    announcer.announce({ text: "two", priority: "polite" });
    await Promise.resolve();
    await Promise.resolve();

    expect(announcer.diagnostics()).toEqual({ announced: 2, failed: 2 });
    expect(announcer.error?.code).toBe("accessibility_unavailable");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[a11y] Speech failed: spawn espeak ENOENT");
  });

  it("counts a synthesizer that throws synchronously", () => {
    setLogSink(() => {});
    const synth = new RecordingSynth();
    synth.speak = () => {
      throw new Error("boom");
    };
    const announcer = new SpeechAnnouncer(synth);
    expect(() => announcer.announce({ text: "hi", priority: "polite" })).not.toThrow();
    expect(announcer.diagnostics()).toEqual({ announced: 0, failed: 1 });
  });

  it("cancels speech once on dispose and ignores later announcements", () => {
    const synth = new RecordingSynth();
    const announcer = new SpeechAnnouncer(synth);
    announcer.dispose();
    announcer.dispose();
    announcer.announce({ text: "late", priority: "polite" });
    expect(synth.cancelled).toBe(1);
    expect(synth.spoken).toEqual([]);
  });
});

describe("a11y/LiveRegionAnnouncer", () => {
  function regions(): { polite: LiveRegionElement; assertive: LiveRegionElement } {
    return { polite: { textContent: "" }, assertive: { textContent: "" } };
  }

  it("writes into the region matching the priority", () => {
    const r = regions();
    const announcer = new LiveRegionAnnouncer(r);
    announcer.announce({ text: "Done", priority: "polite" });
    announcer.announce({ text: "Failed", priority: "assertive" });
    expect(r.polite.textContent).toBe("Done");
    expect(r.assertive.textContent).toBe("Failed");
  });

  it("changes the region text when the same announcement repeats", () => {
    const r = regions();
    const announcer = new LiveRegionAnnouncer(r);
    announcer.announce({ text: "Copied", priority: "polite" });
    announcer.announce({ text: "Copied", priority: "polite" });
    expect(r.polite.textContent).toBe("Copied\u00a0");
    announcer.announce({ text: "Copied", priority: "polite" });
    expect(r.polite.textContent).toBe("Copied");
    expect(announcer.diagnostics()).toEqual({ announced: 3, failed: 0 });
  });

  it("swallows and counts a region that cannot be written", () => {
    setLogSink(() => {});
    const broken: LiveRegionElement = {
      get textContent(): string | null {
        return "";
      },
      set textContent(_value: string | null) {
        throw new Error("detached");
      },
    };
    const announcer = new LiveRegionAnnouncer({ polite: broken, assertive: broken });
    announcer.announce({ text: "hello", priority: "polite" });
    expect(announcer.diagnostics()).toEqual({ announced: 0, failed: 1 });
  });
});

describe("a11y/SilentAnnouncer", () => {
  it("counts announcements it cannot deliver", () => {
    const announcer = new SilentAnnouncer();
    announcer.announce({ text: "hello", priority: "polite" });
    expect(announcer.diagnostics()).toEqual({ announced: 0, failed: 1 });
  });
});
