import { InputEventQueue, type InputQueueSnapshot } from "../input/queue";
import { InputTranslator, type HostInputProfile, type TranslatorDiagnostics } from "../input/translator";
import type { InputEvent, RawInput } from "../input/types";

export interface HostInputOptions {
  profile: HostInputProfile;
  queueCapacity?: number;
  /** Host-reported device pixels per logical pixel at startup. */
  scaleFactor?: number;
  scaleFactorOverride?: number | null;
}

export interface HostInputDiagnostics {
  translator: TranslatorDiagnostics;
  queue: InputQueueSnapshot;
}

/** Raw host input in, translated events queued until the next poll. Shared by both hosts. */
export class HostInput {
  readonly translator: InputTranslator;
  private readonly queue: InputEventQueue;

  constructor(options: HostInputOptions) {
    this.translator = new InputTranslator(options.profile, {
      scaleFactor: options.scaleFactor,
      scaleFactorOverride: options.scaleFactorOverride,
    });
    this.queue = new InputEventQueue({ capacity: options.queueCapacity });
  }

  accept(raw: RawInput): void {
    for (const event of this.translator.translate(raw)) this.queue.push(event);
  }

  poll(): InputEvent[] {
    return this.queue.drain();
  }

  diagnostics(): HostInputDiagnostics {
    return { translator: this.translator.diagnostics(), queue: this.queue.snapshot() };
  }
}
