import { PresentationError, isPresentationError } from "../errors/host_errors";
import { errorMessage } from "../errors/errorProps";
import type { Viewport } from "../display/draw";
import { NO_MODIFIERS, type InputEvent, type Modifiers } from "../input/types";
import { createLogger } from "../log";
import type { HostAdapter } from "../platform/host_adapter";
import { FrameOutput, type FrameContext } from "./frame_context";

const log = createLogger("frame");

/** Immediate-mode UI logic: called once per frame with fresh input, records what to show. */
export interface FrameApp {
  update(ctx: FrameContext, output: FrameOutput): void;
}

export type FrameDriverState = "idle" | "draining" | "dispatching" | "presenting" | "stopped";

export interface FrameDriverMetrics {
  framesPresented: number;
  eventsDispatched: number;
  clipboardRequests: number;
  announcements: number;
}

export type FrameDriverStopReason =
  | { kind: "closed" }
  | { kind: "presentation-lost"; error: PresentationError }
  | { kind: "app-error"; error: unknown };

function foldViewport(viewport: Viewport, events: readonly InputEvent[]): Viewport {
  let next = viewport;
  for (const event of events) {
    if (event.kind !== "host-resize") continue;
    next = { width: event.width, height: event.height, scaleFactor: event.scaleFactor, text: next.text };
  }
  return next === viewport ? viewport : Object.freeze(next);
}

function foldModifiers(modifiers: Modifiers, events: readonly InputEvent[]): Modifiers {
  let next = modifiers;
  for (const event of events) {
    switch (event.kind) {
      case "key-down":
      case "key-up":
      case "pointer-button":
        next = event.modifiers;
        break;
      case "focus-change":
        if (!event.focused) next = NO_MODIFIERS;
        break;
      default:
        break;
    }
  }
  return next;
}

/**
 * Runs the per-frame cycle: drain host input and notifications, hand a frozen
 * {@link FrameContext} to the UI logic, present what it drew, then forward its
 * clipboard requests and announcements to the host bridges.
 */
export class FrameDriver {
  private currentState: FrameDriverState = "idle";
  private frameCounter = 0;
  private nextToken = 1;
  private lastTickMs: number | null = null;
  private viewportState: Viewport;
  private modifiers: Modifiers = NO_MODIFIERS;
  private stopReason: FrameDriverStopReason | null = null;
  private readonly waiters: Array<{ resolve: () => void; reject: (err: unknown) => void }> = [];
  private readonly metrics: FrameDriverMetrics = {
    framesPresented: 0,
    eventsDispatched: 0,
    clipboardRequests: 0,
    announcements: 0,
  };

  constructor(
    private readonly host: HostAdapter,
    private readonly app: FrameApp,
  ) {
    this.viewportState = host.viewport();
  }

  get state(): FrameDriverState {
    return this.currentState;
  }

  get frameIndex(): number {
    return this.frameCounter;
  }

  get viewport(): Viewport {
    return this.viewportState;
  }

  /** `null` while running. */
  get stoppedBecause(): FrameDriverStopReason | null {
    return this.stopReason;
  }

  getMetrics(): FrameDriverMetrics {
    return { ...this.metrics };
  }

  /** Runs one frame. A no-op once stopped, and while a frame is already running. */
  tick(nowMs: number): void {
    if (this.currentState !== "idle") return;

    this.currentState = "draining";
    const events = this.host.pollEvents();
    const notifications = this.host.notifications.drain();
    this.viewportState = foldViewport(this.viewportState, events);
    this.modifiers = foldModifiers(this.modifiers, events);
    const dtMs = this.lastTickMs === null ? 0 : Math.max(0, nowMs - this.lastTickMs);
    this.lastTickMs = nowMs;

    const ctx: FrameContext = Object.freeze({
      frameIndex: this.frameCounter,
      events: Object.freeze([...events]),
      viewport: this.viewportState,
      dtMs,
      modifiers: this.modifiers,
      notifications: Object.freeze(notifications),
      capabilities: this.host.capabilities(),
    });
    this.frameCounter += 1;
    this.metrics.eventsDispatched += events.length;

    this.currentState = "dispatching";
    const output = new FrameOutput(() => this.nextToken++);
    try {
      this.app.update(ctx, output);
    } catch (err) {
      log.error(`UI logic failed in frame ${ctx.frameIndex}: ${errorMessage(err)}`);
      this.finish({ kind: "app-error", error: err });
      return;
    }
    // `stop()` may have been called from inside `update`.
    if (this.isStopped()) return;

    this.currentState = "presenting";
    try {
      this.host.presentFrame(output.commands);
    } catch (err) {
      const error = isPresentationError(err) ? err : new PresentationError(errorMessage(err), { cause: err });
      log.error(`Presentation failed; stopping. ${error.message}`);
      this.finish({ kind: "presentation-lost", error });
      return;
    }
    this.metrics.framesPresented += 1;

    for (const { token, request } of output.clipboardRequests) {
      this.metrics.clipboardRequests += 1;
      const reply = this.host.clipboard.request(request, token);
      if (reply.state === "settled") {
        this.host.notifications.post({ kind: "clipboard", token, op: request.op, outcome: reply.outcome });
      }
    }
    for (const announcement of output.announcements) {
      this.metrics.announcements += 1;
      this.host.accessibility.announce(announcement);
    }

    if (this.isStopped()) return;
    this.currentState = "idle";
    if (output.closeRequested) this.finish({ kind: "closed" });
  }

  /** Starts ticking from the host's tick source. */
  start(): void {
    if (this.currentState === "stopped" || this.host.ticks.running) return;
    this.host.ticks.start((nowMs) => this.tick(nowMs));
  }

  /**
   * Starts ticking and settles once the driver stops: resolves when the UI
   * logic asked to close (or {@link stop} was called), rejects with the
   * `PresentationError` or UI logic exception that stopped it.
   */
  run(): Promise<void> {
    const done = new Promise<void>((resolve, reject) => {
      if (this.stopReason) {
        this.settle(this.stopReason, { resolve, reject });
        return;
      }
      this.waiters.push({ resolve, reject });
    });
    this.start();
    return done;
  }

  stop(): void {
    this.finish({ kind: "closed" });
  }

  private isStopped(): boolean {
    return this.currentState === "stopped";
  }

  private finish(reason: FrameDriverStopReason): void {
    if (this.isStopped()) return;
    this.currentState = "stopped";
    this.stopReason = reason;
    this.host.ticks.stop();
    log.info(`Stopped after ${this.frameCounter} frames (${reason.kind}).`);
    for (const waiter of this.waiters.splice(0)) this.settle(reason, waiter);
  }

  private settle(reason: FrameDriverStopReason, waiter: { resolve: () => void; reject: (err: unknown) => void }): void {
    if (reason.kind === "closed") waiter.resolve();
    else waiter.reject(reason.error);
  }
}
