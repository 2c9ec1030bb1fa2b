import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";

import type { SpeechOptions, SpeechSynthesizer } from "../../web/src/a11y/speech_announcer";
import { AccessibilityUnavailableError } from "../../web/src/errors/host_errors";
import { errorMessage } from "../../web/src/errors/errorProps";

/** The slice of `ChildProcess` the synthesizer uses. */
export interface SpeechProcess extends Pick<EventEmitter, "once"> {
  kill(): boolean;
}

export type SpawnSpeech = (program: string, args: readonly string[]) => SpeechProcess;

const spawnDetached: SpawnSpeech = (program, args) => spawn(program, [...args], { stdio: "ignore" });

/**
 * Speaks through an external command (`espeak`, `say`, `spd-say`), with the
 * text as its last argument.
 */
export class CommandSpeechSynthesizer implements SpeechSynthesizer {
  private readonly program: string;
  private readonly args: readonly string[];
  private readonly running = new Set<SpeechProcess>();

  constructor(
    command: string,
    private readonly spawnProcess: SpawnSpeech = spawnDetached,
  ) {
    const [program = "", ...args] = command.trim().split(/\s+/);
    this.program = program;
    this.args = args;
  }

  speak(text: string, options: SpeechOptions): Promise<void> {
    if (this.program === "") {
      return Promise.reject(new AccessibilityUnavailableError("No speech command configured."));
    }
    if (options.interrupt) this.cancel();

    const child = this.spawnProcess(this.program, [...this.args, text]);
    this.running.add(child);
    return new Promise<void>((resolve, reject) => {
      child.once("error", (err: unknown) => {
        this.running.delete(child);
        reject(new AccessibilityUnavailableError(`Speech command failed: ${errorMessage(err)}`, { cause: err }));
      });
      child.once("exit", (code: unknown, signal: unknown) => {
        this.running.delete(child);
        // Killed by cancel().
        if (code === 0 || (typeof signal === "string" && signal !== "")) resolve();
        else reject(new AccessibilityUnavailableError(`Speech command exited with code ${String(code)}.`));
      });
    });
  }

  cancel(): void {
    for (const child of this.running) child.kill();
    this.running.clear();
  }
}
