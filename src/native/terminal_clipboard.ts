import type { SystemClipboard } from "../../web/src/clipboard/system_clipboard_bridge";
import type { ClipboardPayload } from "../../web/src/clipboard/types";
import { ClipboardError } from "../../web/src/errors/host_errors";

/** Where the OSC 52 sequence goes; the terminal's output stream. */
export interface ClipboardSequenceOutput {
  readonly writable: boolean;
  write(chunk: string): boolean;
}

/** Asks the terminal emulator to put `text` on the system clipboard. */
export function osc52(text: string): string {
  return `\x1b]52;c;${Buffer.from(text, "utf8").toString("base64")}\x07`;
}

/**
 * Text clipboard for the terminal host. Writes go to the terminal emulator
 * through OSC 52 and are kept locally; terminals do not answer clipboard
 * reads synchronously, so reads return the last text written here.
 */
export class TerminalClipboard implements SystemClipboard {
  readonly supportsBinary = false;
  private text: string | null = null;

  constructor(private readonly output: ClipboardSequenceOutput | null) {}

  read(): ClipboardPayload | null {
    return this.text === null ? null : { kind: "text", text: this.text };
  }

  write(payload: ClipboardPayload): void {
    if (payload.kind !== "text") {
      throw new ClipboardError("clipboard_unavailable", `Terminal clipboard cannot hold ${payload.mimeType} data.`);
    }
    if (this.output) {
      if (!this.output.writable) throw new ClipboardError("clipboard_unavailable", "Terminal output is closed.");
      this.output.write(osc52(payload.text));
    }
    this.text = payload.text;
  }
}
