import { SilentAnnouncer, type AccessibilityBridge } from "../a11y/types";
import { SpeechAnnouncer, type SpeechSynthesizer } from "../a11y/speech_announcer";
import { UnavailableClipboardBridge } from "../clipboard/async_clipboard_bridge";
import { SystemClipboardBridge, type SystemClipboard } from "../clipboard/system_clipboard_bridge";
import type { ClipboardBridge } from "../clipboard/types";
import type { DrawCommand, TextMetrics, Viewport } from "../display/draw";
import { NATIVE_INPUT_PROFILE } from "../input/translator";
import type { InputEvent, RawInput } from "../input/types";
import { NotificationMailbox } from "../main/notifications";
import { defineHostCapabilities, type HostAdapter, type HostCapabilities } from "./host_adapter";
import { HostInput, type HostInputDiagnostics } from "./host_input";
import { TimerTickSource, type TickSource } from "./tick_source";

/** A native window (or terminal) the host draws into and reads input from. */
export interface NativeWindow {
  /** Raw input since the previous call. Must not block. */
  pollRawEvents(): RawInput[];
  /** Throws `PresentationError` once the window is gone. */
  present(commands: readonly DrawCommand[], viewport: Viewport): void;
  /** Device pixels. */
  size(): { width: number; height: number };
  scaleFactor(): number;
  readonly textMetrics: TextMetrics;
  close(): void;
}

export interface NativeHostOptions {
  window: NativeWindow;
  clipboard: SystemClipboard | null;
  speech: SpeechSynthesizer | null;
  queueCapacity?: number;
  targetFps?: number;
  scaleFactorOverride?: number | null;
  ticks?: TickSource;
}

export class NativeHostAdapter implements HostAdapter {
  readonly clipboard: ClipboardBridge;
  readonly accessibility: AccessibilityBridge;
  readonly ticks: TickSource;
  readonly notifications = new NotificationMailbox();
  private readonly window: NativeWindow;
  private readonly input: HostInput;
  private readonly caps: HostCapabilities;
  private closed = false;

  constructor(options: NativeHostOptions) {
    this.window = options.window;
    this.input = new HostInput({
      profile: NATIVE_INPUT_PROFILE,
      queueCapacity: options.queueCapacity,
      scaleFactor: options.window.scaleFactor(),
      scaleFactorOverride: options.scaleFactorOverride,
    });
    this.clipboard = options.clipboard
      ? new SystemClipboardBridge(options.clipboard)
      : new UnavailableClipboardBridge("No system clipboard.");
    this.accessibility = options.speech ? new SpeechAnnouncer(options.speech) : new SilentAnnouncer();
    this.ticks = options.ticks ?? new TimerTickSource({ targetFps: options.targetFps ?? 60 });
    this.caps = defineHostCapabilities({
      host: "native",
      clipboard: options.clipboard !== null,
      clipboardBinary: options.clipboard?.supportsBinary ?? false,
      clipboardPermissionGated: false,
      accessibility: options.speech !== null,
      resizeEvents: true,
    });
  }

  pollEvents(): readonly InputEvent[] {
    for (const raw of this.window.pollRawEvents()) this.input.accept(raw);
    return this.input.poll();
  }

  presentFrame(commands: readonly DrawCommand[]): void {
    this.window.present(commands, this.viewport());
  }

  capabilities(): HostCapabilities {
    return this.caps;
  }

  viewport(): Viewport {
    const { width, height } = this.window.size();
    const translator = this.input.translator;
    return {
      width: translator.toLogical(width),
      height: translator.toLogical(height),
      scaleFactor: translator.scaleFactor,
      text: this.window.textMetrics,
    };
  }

  inputDiagnostics(): HostInputDiagnostics {
    return this.input.diagnostics();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.ticks.stop();
    this.clipboard.dispose();
    this.accessibility.dispose();
    this.notifications.close();
    this.window.close();
  }
}
