import { ClipboardError } from "../errors/host_errors";
import { errorMessage } from "../errors/errorProps";
import {
  settled,
  unavailable,
  type ClipboardBridge,
  type ClipboardOutcome,
  type ClipboardPayload,
  type ClipboardReply,
  type ClipboardRequest,
  type RequestToken,
} from "./types";

/**
 * Synchronous OS clipboard. Implementations throw {@link ClipboardError} when
 * the clipboard cannot be reached.
 */
export interface SystemClipboard {
  readonly supportsBinary: boolean;
  /** `null` when the clipboard is empty. */
  read(): ClipboardPayload | null;
  write(payload: ClipboardPayload): void;
}

/** In-process clipboard, for hosts without a system clipboard of their own. */
export class MemorySystemClipboard implements SystemClipboard {
  readonly supportsBinary = true;
  private content: ClipboardPayload | null = null;

  read(): ClipboardPayload | null {
    return this.content;
  }

  write(payload: ClipboardPayload): void {
    this.content = payload.kind === "bytes" ? { ...payload, bytes: payload.bytes.slice() } : payload;
  }
}

/** Native bridge: every request settles before `request` returns. */
export class SystemClipboardBridge implements ClipboardBridge {
  private disposed = false;

  constructor(private readonly clipboard: SystemClipboard) {}

  request(request: ClipboardRequest, _token: RequestToken): ClipboardReply {
    if (this.disposed) return settled(unavailable("Clipboard bridge is closed."));
    try {
      return settled(this.perform(request));
    } catch (err) {
      if (err instanceof ClipboardError && err.code === "clipboard_permission_denied") {
        return settled({ status: "permission-denied", message: err.message });
      }
      return settled(unavailable(errorMessage(err)));
    }
  }

  dispose(): void {
    this.disposed = true;
  }

  private perform(request: ClipboardRequest): ClipboardOutcome {
    if (request.op === "read") {
      const payload = this.clipboard.read() ?? { kind: "text", text: "" };
      return { status: "ok", op: "read", payload };
    }
    if (request.payload.kind === "bytes" && !this.clipboard.supportsBinary) {
      return unavailable(`Clipboard cannot hold ${request.payload.mimeType} data.`);
    }
    this.clipboard.write(request.payload);
    return { status: "ok", op: "write" };
  }
}
