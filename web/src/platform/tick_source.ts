export type TickCallback = (nowMs: number) => void;

/** Drives the frame loop: a timer on native hosts, `requestAnimationFrame` in the browser. */
export interface TickSource {
  start(onTick: TickCallback): void;
  stop(): void;
  readonly running: boolean;
}

export interface TimerTickSourceOptions {
  targetFps: number;
  now?: () => number;
}

export class TimerTickSource implements TickSource {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TimerTickSourceOptions) {
    const fps = Number.isFinite(options.targetFps) && options.targetFps > 0 ? options.targetFps : 60;
    this.intervalMs = Math.max(1, Math.round(1000 / fps));
    this.now = options.now ?? (() => performance.now());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get periodMs(): number {
    return this.intervalMs;
  }

  start(onTick: TickCallback): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => onTick(this.now()), this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}

export interface AnimationFrameApi {
  requestAnimationFrame(callback: FrameRequestCallback): number;
  cancelAnimationFrame(handle: number): void;
}

export class AnimationFrameTickSource implements TickSource {
  private rafId: number | null = null;
  private onTick: TickCallback | null = null;

  constructor(private readonly api: AnimationFrameApi = globalThis) {}

  get running(): boolean {
    return this.onTick !== null;
  }

  start(onTick: TickCallback): void {
    if (this.onTick) return;
    this.onTick = onTick;
    this.rafId = this.api.requestAnimationFrame(this.loop);
  }

  stop(): void {
    this.onTick = null;
    if (this.rafId !== null) this.api.cancelAnimationFrame(this.rafId);
    this.rafId = null;
  }

  private readonly loop = (frameTimeMs: number): void => {
    const onTick = this.onTick;
    if (!onTick) return;
    onTick(frameTimeMs);
    // The callback may have stopped the source.
    if (this.onTick) this.rafId = this.api.requestAnimationFrame(this.loop);
  };
}
