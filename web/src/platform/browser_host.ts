import { LiveRegionAnnouncer, type LiveRegions } from "../a11y/live_region_announcer";
import { SilentAnnouncer, type AccessibilityBridge } from "../a11y/types";
import {
  AsyncClipboardBridge,
  UnavailableClipboardBridge,
  defaultCreateClipboardItem,
  type AsyncClipboard,
} from "../clipboard/async_clipboard_bridge";
import type { ClipboardBridge } from "../clipboard/types";
import { CanvasPresenter } from "../display/canvas_presenter";
import type { DrawCommand, TextMetrics, Viewport } from "../display/draw";
import { PresentationError } from "../errors/host_errors";
import { BROWSER_INPUT_PROFILE } from "../input/translator";
import type { InputEvent, Modifiers, RawInput } from "../input/types";
import { createLogger } from "../log";
import { NotificationMailbox } from "../main/notifications";
import { defineHostCapabilities, type HostAdapter, type HostCapabilities } from "./host_adapter";
import { HostInput, type HostInputDiagnostics } from "./host_input";
import { AnimationFrameTickSource, type TickSource } from "./tick_source";

const log = createLogger("browser-host");

export const BROWSER_TEXT_METRICS: TextMetrics = Object.freeze({ charWidth: 8, lineHeight: 16 });

export interface BrowserHostOptions {
  canvas: HTMLCanvasElement;
  window: Window;
  /** `navigator.clipboard`, or `null` when the page has none or the build leaves it off. */
  clipboard: AsyncClipboard | null;
  liveRegions: LiveRegions | null;
  queueCapacity?: number;
  scaleFactorOverride?: number | null;
  ticks?: TickSource;
}

function modifiersOf(e: MouseEvent | KeyboardEvent): Modifiers {
  return { shift: e.shiftKey, ctrl: e.ctrlKey, alt: e.altKey, meta: e.metaKey };
}

function wheelUnit(deltaMode: number): "pixel" | "line" | "page" {
  // WheelEvent.DOM_DELTA_LINE / DOM_DELTA_PAGE.
  if (deltaMode === 1) return "line";
  if (deltaMode === 2) return "page";
  return "pixel";
}

// Keys the page would otherwise act on (scrolling, focus traversal, history).
const PREVENT_DEFAULT_CODES = new Set([
  "Tab",
  "Space",
  "Backspace",
  "ArrowUp",
  "ArrowDown",
  "ArrowLeft",
  "ArrowRight",
  "PageUp",
  "PageDown",
  "Home",
  "End",
]);

/**
 * Browser host. DOM listeners translate input as it arrives and queue it;
 * {@link pollEvents} drains the queue at the start of each animation frame.
 */
export class BrowserHostAdapter implements HostAdapter {
  readonly clipboard: ClipboardBridge;
  readonly accessibility: AccessibilityBridge;
  readonly ticks: TickSource;
  readonly notifications = new NotificationMailbox();
  private readonly canvas: HTMLCanvasElement;
  private readonly win: Window;
  private readonly input: HostInput;
  private readonly presenter: CanvasPresenter;
  private readonly caps: HostCapabilities;
  private readonly removers: Array<() => void> = [];
  private surfaceLost: string | null = null;
  private closed = false;
  private focused: boolean | null = null;

  constructor(options: BrowserHostOptions) {
    this.canvas = options.canvas;
    this.win = options.window;
    this.input = new HostInput({
      profile: BROWSER_INPUT_PROFILE,
      queueCapacity: options.queueCapacity,
      scaleFactor: this.win.devicePixelRatio,
      scaleFactorOverride: options.scaleFactorOverride,
    });
    this.presenter = new CanvasPresenter(this.canvas);
    this.ticks = options.ticks ?? new AnimationFrameTickSource(this.win);

    const createItem = defaultCreateClipboardItem();
    this.clipboard = options.clipboard
      ? new AsyncClipboardBridge({ clipboard: options.clipboard, notify: this.notifications.post, createItem })
      : new UnavailableClipboardBridge("Clipboard access is not enabled in this build.");
    this.accessibility = options.liveRegions ? new LiveRegionAnnouncer(options.liveRegions) : new SilentAnnouncer();
    this.caps = defineHostCapabilities({
      host: "browser",
      clipboard: options.clipboard !== null,
      clipboardBinary: options.clipboard !== null && typeof options.clipboard.write === "function" && createItem !== null,
      clipboardPermissionGated: true,
      accessibility: options.liveRegions !== null,
      resizeEvents: true,
    });

    this.installListeners();
  }

  pollEvents(): readonly InputEvent[] {
    return this.input.poll();
  }

  presentFrame(commands: readonly DrawCommand[]): void {
    if (this.surfaceLost !== null) throw new PresentationError(this.surfaceLost);
    this.presenter.present(commands, this.viewport());
  }

  capabilities(): HostCapabilities {
    return this.caps;
  }

  viewport(): Viewport {
    return {
      width: this.canvas.clientWidth,
      height: this.canvas.clientHeight,
      scaleFactor: this.input.translator.scaleFactor,
      text: BROWSER_TEXT_METRICS,
    };
  }

  inputDiagnostics(): HostInputDiagnostics {
    return this.input.diagnostics();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const remove of this.removers.splice(0)) remove();
    this.ticks.stop();
    this.clipboard.dispose();
    this.accessibility.dispose();
    this.notifications.close();
  }

  private accept(raw: RawInput): void {
    if (this.closed) return;
    this.input.accept(raw);
  }

  private listen<K extends keyof HTMLElementEventMap>(
    type: K,
    handler: (e: HTMLElementEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.canvas.addEventListener(type, handler, options);
    this.removers.push(() => this.canvas.removeEventListener(type, handler, options));
  }

  private listenWindow<K extends keyof WindowEventMap>(type: K, handler: (e: WindowEventMap[K]) => void): void {
    this.win.addEventListener(type, handler);
    this.removers.push(() => this.win.removeEventListener(type, handler));
  }

  /** Client (CSS) coordinates to device pixels relative to the canvas. */
  private devicePoint(e: MouseEvent): { x: number; y: number } {
    const rect = this.canvas.getBoundingClientRect();
    const ratio = this.input.translator.scaleFactor;
    return { x: (e.clientX - rect.left) * ratio, y: (e.clientY - rect.top) * ratio };
  }

  private installListeners(): void {
    const pointerButton = (e: PointerEvent, pressed: boolean): void => {
      e.preventDefault();
      if (pressed) this.canvas.focus();
      const { x, y } = this.devicePoint(e);
      this.accept({ type: "pointer-button", button: e.button, pressed, x, y, modifiers: modifiersOf(e), timestampMs: e.timeStamp });
    };
    const key = (e: KeyboardEvent, pressed: boolean): void => {
      if (PREVENT_DEFAULT_CODES.has(e.code)) e.preventDefault();
      this.accept({
        type: "key",
        code: e.code,
        pressed,
        repeat: e.repeat,
        modifiers: modifiersOf(e),
        timestampMs: e.timeStamp,
      });
      // Printable keys also produce text, unless a shortcut modifier is held.
      if (pressed && e.key.length > 0 && Array.from(e.key).length === 1 && !e.ctrlKey && !e.metaKey) {
        this.accept({ type: "text", text: e.key, timestampMs: e.timeStamp });
      }
    };

    this.listen("pointermove", (e) => {
      const { x, y } = this.devicePoint(e);
      this.accept({ type: "pointer-move", x, y, timestampMs: e.timeStamp });
    });
    this.listen("pointerdown", (e) => pointerButton(e, true));
    this.listen("pointerup", (e) => pointerButton(e, false));
    this.listen(
      "wheel",
      (e) => {
        e.preventDefault();
        const unit = wheelUnit(e.deltaMode);
        // Pixel deltas are CSS pixels; the translator expects device pixels.
        const ratio = unit === "pixel" ? this.input.translator.scaleFactor : 1;
        this.accept({ type: "scroll", dx: e.deltaX * ratio, dy: e.deltaY * ratio, unit, timestampMs: e.timeStamp });
      },
      { passive: false },
    );
    this.listen("keydown", (e) => key(e, true));
    this.listen("keyup", (e) => key(e, false));
    this.listen("contextmenu", (e) => e.preventDefault());
    this.listen("focus", (e) => this.focusChanged(true, e.timeStamp));
    this.listen("blur", (e) => this.focusChanged(false, e.timeStamp));

    this.listenWindow("resize", (e) => {
      const ratio = this.win.devicePixelRatio;
      // Device pixels here are whatever the translator divides by, which is
      // the override when one is configured.
      this.input.translator.setHostScaleFactor(ratio);
      const scale = this.input.translator.scaleFactor;
      this.accept({
        type: "resize",
        width: this.canvas.clientWidth * scale,
        height: this.canvas.clientHeight * scale,
        scaleFactor: ratio,
        timestampMs: e.timeStamp,
      });
    });
    // Keys held while the window loses focus never see their keyup.
    this.listenWindow("blur", (e) => this.focusChanged(false, e.timeStamp));
    // A hidden tab keeps its surface; only leaving the page loses it. A page
    // restored from the back/forward cache starts a fresh host.
    this.listenWindow("pagehide", () => this.loseSurface("Page was unloaded."));
  }

  /** Canvas and window both report a blur; only a change of state is passed on. */
  private focusChanged(focused: boolean, timestampMs: number): void {
    if (this.focused === focused) return;
    this.focused = focused;
    this.accept({ type: "focus", focused, timestampMs });
  }

  private loseSurface(reason: string): void {
    if (this.surfaceLost !== null) return;
    this.surfaceLost = reason;
    log.warn(reason);
  }
}
