import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { InputEventQueue } from "./queue";
import { keyDown, keyUp, pointerButton, pointerMove, seqs } from "./test_utils";
import { isPairedInput, isPress, pairKey, type InputEvent } from "./types";

const eventKind = fc.constantFrom("move", "key", "button");

// Well-formed host stream: each key and button alternates press and release.
function build(kinds: readonly string[]): InputEvent[] {
  let keyHeld = false;
  let buttonHeld = false;
  return kinds.map((kind, i) => {
    const seq = i + 1;
    if (kind === "key") {
      keyHeld = !keyHeld;
      return keyHeld ? keyDown(seq, "KeyK") : keyUp(seq, "KeyK");
    }
    if (kind === "button") {
      buttonHeld = !buttonHeld;
      return pointerButton(seq, buttonHeld);
    }
    return pointerMove(seq, seq, seq);
  });
}

describe("InputEventQueue properties", () => {
  it("returns every event in push order while under capacity", () => {
    fc.assert(
      fc.property(fc.array(eventKind, { maxLength: 64 }), (kinds) => {
        const queue = new InputEventQueue({ capacity: 64 });
        const events = build(kinds);
        for (const e of events) expect(queue.push(e)).toBe(true);

        const drained = queue.drain();
        expect(drained).toEqual(events);
        for (let i = 1; i < drained.length; i += 1) {
          expect(drained[i]?.seq).toBeGreaterThan(drained[i - 1]?.seq ?? 0);
        }
      }),
    );
  });

  it("keeps the most recent pointer moves under overflow", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 32 }), fc.integer({ min: 0, max: 64 }), (capacity, extra) => {
        const queue = new InputEventQueue({ capacity });
        const total = capacity + extra;
        for (let seq = 1; seq <= total; seq += 1) queue.push(pointerMove(seq));

        const expected = Array.from({ length: capacity }, (_, i) => total - capacity + i + 1);
        expect(seqs(queue.drain())).toEqual(expected);
        expect(queue.snapshot().dropped).toBe(extra);
      }),
    );
  });

  it("never exceeds capacity, keeps order and never splits a pair", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 8 }), fc.array(eventKind, { maxLength: 80 }), (capacity, kinds) => {
        const queue = new InputEventQueue({ capacity });
        const delivered: InputEvent[] = [];
        const events = build(kinds);
        for (const [i, e] of events.entries()) {
          queue.push(e);
          expect(queue.size).toBeLessThanOrEqual(capacity);
          if (i % 5 === 4) delivered.push(...queue.drain());
        }
        delivered.push(...queue.drain());

        for (let i = 1; i < delivered.length; i += 1) {
          expect(delivered[i]?.seq).toBeGreaterThan(delivered[i - 1]?.seq ?? 0);
        }

        // Every delivered release must follow a delivered press of the same pair.
        const held = new Set<string>();
        for (const e of delivered) {
          if (!isPairedInput(e)) continue;
          if (isPress(e)) {
            held.add(pairKey(e));
          } else {
            expect(held.has(pairKey(e))).toBe(true);
            held.delete(pairKey(e));
          }
        }
      }),
    );
  });
});
