import { NO_MODIFIERS, type InputEvent, type PointerButton } from "./types";

export function keyDown(seq: number, key = "KeyA", timestampMs = seq): InputEvent {
  return { kind: "key-down", key, repeat: false, modifiers: NO_MODIFIERS, seq, timestampMs };
}

export function keyUp(seq: number, key = "KeyA", timestampMs = seq): InputEvent {
  return { kind: "key-up", key, repeat: false, modifiers: NO_MODIFIERS, seq, timestampMs };
}

export function pointerMove(seq: number, x = 0, y = 0, timestampMs = seq): InputEvent {
  return { kind: "pointer-move", x, y, seq, timestampMs };
}

export function pointerButton(seq: number, pressed: boolean, button: PointerButton = "primary"): InputEvent {
  return { kind: "pointer-button", button, pressed, x: 0, y: 0, modifiers: NO_MODIFIERS, seq, timestampMs: seq };
}

export function seqs(events: readonly InputEvent[]): number[] {
  return events.map((e) => e.seq);
}
