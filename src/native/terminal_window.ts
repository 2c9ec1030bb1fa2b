import type { EventEmitter } from "node:events";

import type { DrawCommand, TextMetrics, Viewport } from "../../web/src/display/draw";
import { TerminalPresenter } from "../../web/src/display/terminal_presenter";
import { PresentationError } from "../../web/src/errors/host_errors";
import { errorMessage } from "../../web/src/errors/errorProps";
import type { RawInput } from "../../web/src/input/types";
import { createLogger } from "../../web/src/log";
import type { NativeWindow } from "../../web/src/platform/native_host";
import { TerminalInputDecoder, type TerminalDecoderDiagnostics } from "./terminal_input";

const log = createLogger("terminal");

// Alternate screen, hidden cursor, button-event mouse tracking in SGR format,
// focus reporting.
const ENTER_SCREEN = "\x1b[?1049h\x1b[?25l\x1b[?1002h\x1b[?1006h\x1b[?1004h";
const LEAVE_SCREEN = "\x1b[?1004l\x1b[?1006l\x1b[?1002l\x1b[0m\x1b[?25h\x1b[?1049l";

/** A lone ESC followed by nothing for this long is the Escape key. */
export const ESCAPE_TIMEOUT_MS = 50;

/** One logical pixel is one cell. */
export const TERMINAL_TEXT_METRICS: TextMetrics = Object.freeze({ charWidth: 1, lineHeight: 1 });

/** `process.stdin`, or a stand-in. */
export interface TerminalInput extends Pick<EventEmitter, "on" | "off"> {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** `process.stdout`, or a stand-in. */
export interface TerminalScreen extends Pick<EventEmitter, "on" | "off"> {
  readonly writable: boolean;
  readonly columns?: number;
  readonly rows?: number;
  write(chunk: string): boolean;
}

export interface TerminalWindowOptions {
  input: TerminalInput;
  screen: TerminalScreen;
  now?: () => number;
}

/** The terminal as a {@link NativeWindow}: reads raw stdin, draws with ANSI escapes. */
export class TerminalWindow implements NativeWindow {
  readonly textMetrics = TERMINAL_TEXT_METRICS;
  private readonly input: TerminalInput;
  private readonly screen: TerminalScreen;
  private readonly now: () => number;
  private readonly presenter: TerminalPresenter;
  private readonly decoder = new TerminalInputDecoder();
  private readonly removers: Array<() => void> = [];
  private pending: RawInput[] = [];
  private lastInputMs = 0;
  private lostReason: string | null = null;
  private closed = false;

  constructor(options: TerminalWindowOptions) {
    this.input = options.input;
    this.screen = options.screen;
    this.now = options.now ?? (() => performance.now());
    this.presenter = new TerminalPresenter(this.screen);

    this.listen(this.input, "data", (chunk: unknown) => this.onData(chunk));
    this.listen(this.input, "end", () => this.loseSurface("Terminal input closed."));
    this.listen(this.screen, "resize", () => this.onResize());
    this.listen(this.screen, "error", (err: unknown) => this.loseSurface(`Terminal output failed: ${errorMessage(err)}`));
    this.listen(this.screen, "close", () => this.loseSurface("Terminal output closed."));

    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.setEncoding("utf8");
    this.input.resume();
    this.screen.write(ENTER_SCREEN);
  }

  pollRawEvents(): RawInput[] {
    const now = this.now();
    if (this.decoder.pending && now - this.lastInputMs >= ESCAPE_TIMEOUT_MS) {
      this.pending.push(...this.decoder.flush(now));
    }
    const out = this.pending;
    this.pending = [];
    return out;
  }

  present(commands: readonly DrawCommand[], viewport: Viewport): void {
    if (this.lostReason !== null) throw new PresentationError(this.lostReason);
    this.presenter.present(commands, viewport);
  }

  size(): { width: number; height: number } {
    return { width: this.screen.columns ?? 80, height: this.screen.rows ?? 24 };
  }

  scaleFactor(): number {
    return 1;
  }

  decoderDiagnostics(): TerminalDecoderDiagnostics {
    return this.decoder.diagnostics();
  }

  /** Restores the terminal. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const remove of this.removers.splice(0)) remove();
    if (this.screen.writable) this.screen.write(LEAVE_SCREEN);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
  }

  private listen(target: Pick<EventEmitter, "on" | "off">, event: string, handler: (...args: unknown[]) => void): void {
    target.on(event, handler);
    this.removers.push(() => target.off(event, handler));
  }

  private onData(chunk: unknown): void {
    const text = typeof chunk === "string" ? chunk : Buffer.isBuffer(chunk) ? chunk.toString("utf8") : "";
    if (text === "") return;
    this.lastInputMs = this.now();
    this.pending.push(...this.decoder.decode(text, this.lastInputMs));
  }

  private onResize(): void {
    const { width, height } = this.size();
    this.presenter.invalidate();
    this.pending.push({ type: "resize", width, height, scaleFactor: 1, timestampMs: this.now() });
  }

  private loseSurface(reason: string): void {
    if (this.lostReason !== null || this.closed) return;
    this.lostReason = reason;
    log.warn(reason);
  }
}
