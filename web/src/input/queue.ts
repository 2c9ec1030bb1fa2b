import { isPairedInput, isPress, pairKey, type InputEvent, type KeyEvent, type PointerButtonEvent } from "./types";

export interface InputQueueSnapshot {
  depth: number;
  capacity: number;
  /** Events evicted or discarded under backpressure since construction. */
  dropped: number;
  oldestTimestampMs: number | null;
}

export const DEFAULT_INPUT_QUEUE_CAPACITY = 256;

export function sanitizeQueueCapacity(capacity: unknown): number {
  // Capacity may come from user config. `NaN` in particular would make
  // `events.length >= capacity` always false, resulting in unbounded growth.
  if (typeof capacity !== "number" || !Number.isFinite(capacity)) return DEFAULT_INPUT_QUEUE_CAPACITY;
  const c = Math.floor(capacity);
  return c >= 1 ? c : DEFAULT_INPUT_QUEUE_CAPACITY;
}

/**
 * Bounded FIFO between the host's input producers and the frame driver.
 *
 * Backpressure: pushing into a full queue evicts one queued event first.
 * Continuous input (pointer motion, scroll, text, resize, focus) goes before
 * key and button events. When only key/button events remain, the oldest press
 * is evicted together with its release so the consumer never sees half of a
 * press/release pair; if the release has not arrived yet it is discarded on
 * arrival. With no press queued, an incoming press is discarded instead (and
 * its release with it).
 *
 * `drain()` swaps out the backing array in a single statement, so a producer
 * callback can never land in the middle of a drained batch.
 */
export class InputEventQueue {
  readonly capacity: number;
  private events: InputEvent[] = [];
  private dropped = 0;
  private readonly suppressedReleases = new Set<string>();

  constructor({ capacity = DEFAULT_INPUT_QUEUE_CAPACITY }: { capacity?: number } = {}) {
    this.capacity = sanitizeQueueCapacity(capacity);
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Returns false when `event` itself was discarded (the release of a press
   * that was evicted earlier).
   */
  push(event: InputEvent): boolean {
    if (isPairedInput(event)) {
      if (!isPress(event) && this.suppressedReleases.delete(pairKey(event))) {
        this.dropped += 1;
        return false;
      }
      // An auto-repeat press re-opens the pair; its release must get through.
      if (isPress(event)) this.suppressedReleases.delete(pairKey(event));
    }
    if (this.events.length >= this.capacity && !this.evictFor(event)) {
      return false;
    }
    this.events.push(event);
    return true;
  }

  drain(): InputEvent[] {
    const out = this.events;
    this.events = [];
    return out;
  }

  snapshot(): InputQueueSnapshot {
    const oldest = this.events[0];
    return {
      depth: this.events.length,
      capacity: this.capacity,
      dropped: this.dropped,
      oldestTimestampMs: oldest ? oldest.timestampMs : null,
    };
  }

  /** Makes room for `incoming`. Returns false if `incoming` must be discarded instead. */
  private evictFor(incoming: InputEvent): boolean {
    const unpairedIdx = this.events.findIndex((e) => !isPairedInput(e));
    if (unpairedIdx >= 0) {
      this.events.splice(unpairedIdx, 1);
      this.dropped += 1;
      return true;
    }

    // Only presses and releases are queued. Queued releases whose press was
    // already delivered are kept: dropping them would leave a key held.
    const pressIdx = this.events.findIndex((e) => isPairedInput(e) && isPress(e));
    const press = pressIdx >= 0 ? this.events[pressIdx] : undefined;
    if (press && isPairedInput(press)) {
      this.events.splice(pressIdx, 1);
      this.dropped += 1;
      this.dropPartnerOf(press, pressIdx);
      if (this.suppressedReleases.has(pairKey(press)) && releases(incoming, pairKey(press))) {
        this.suppressedReleases.delete(pairKey(press));
        this.dropped += 1;
        return false;
      }
      return true;
    }

    if (isPairedInput(incoming) && isPress(incoming)) {
      this.suppressedReleases.add(pairKey(incoming));
      this.dropped += 1;
      return false;
    }

    // Every queued event is a release of a delivered press and so is the
    // incoming one. More keys are held than the queue can hold; give up the
    // oldest.
    this.events.shift();
    this.dropped += 1;
    return true;
  }

  /**
   * After evicting `press` from `fromIdx`, removes its queued release, or
   * marks the release for discarding if it has not arrived yet. A queued
   * auto-repeat press keeps the pair intact on its own.
   */
  private dropPartnerOf(press: KeyEvent | PointerButtonEvent, fromIdx: number): void {
    const key = pairKey(press);
    for (let i = fromIdx; i < this.events.length; i += 1) {
      const e = this.events[i];
      if (!e || !isPairedInput(e) || pairKey(e) !== key) continue;
      if (!isPress(e)) {
        this.events.splice(i, 1);
        this.dropped += 1;
      }
      return;
    }
    this.suppressedReleases.add(key);
  }
}

function releases(event: InputEvent, key: string): boolean {
  return isPairedInput(event) && !isPress(event) && pairKey(event) === key;
}
