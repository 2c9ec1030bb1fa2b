import { errorMessage, tryGetErrorName } from "../errors/errorProps";
import { createLogger } from "../log";
import type { NotificationSink } from "../main/notifications";
import {
  unavailable,
  type ClipboardBridge,
  type ClipboardOutcome,
  type ClipboardPayload,
  type ClipboardReply,
  type ClipboardRequest,
  type RequestToken,
} from "./types";

const log = createLogger("clipboard");

/** The part of `ClipboardItem` the bridge reads. */
export interface ClipboardItemLike {
  readonly types: readonly string[];
  getType(type: string): Promise<Blob>;
}

/** The part of `navigator.clipboard` the bridge uses. `read`/`write` are absent in some browsers. */
export interface AsyncClipboard {
  readText(): Promise<string>;
  writeText(text: string): Promise<void>;
  read?(): Promise<ClipboardItemLike[]>;
  write?(items: ClipboardItem[]): Promise<void>;
}

export interface AsyncClipboardBridgeOptions {
  clipboard: AsyncClipboard;
  notify: NotificationSink;
  /** Builds a `ClipboardItem`; `null` when the browser has no `ClipboardItem`. */
  createItem?: ((mimeType: string, bytes: Uint8Array) => ClipboardItem) | null;
}

const PERMISSION_ERROR_NAMES = new Set(["NotAllowedError", "SecurityError"]);

export function defaultCreateClipboardItem(): ((mimeType: string, bytes: Uint8Array) => ClipboardItem) | null {
  if (typeof globalThis.ClipboardItem === "undefined") return null;
  return (mimeType, bytes) => new ClipboardItem({ [mimeType]: new Blob([bytes.slice()], { type: mimeType }) });
}

/** Maps a rejected `navigator.clipboard` promise to an outcome. */
export function clipboardFailureOutcome(err: unknown): ClipboardOutcome {
  const name = tryGetErrorName(err);
  if (name !== undefined && PERMISSION_ERROR_NAMES.has(name)) {
    return { status: "permission-denied", message: errorMessage(err) };
  }
  return unavailable(errorMessage(err));
}

/**
 * Browser bridge over the async Clipboard API. Every request replies
 * `pending`; the outcome is posted to `notify` when the promise settles.
 */
export class AsyncClipboardBridge implements ClipboardBridge {
  private readonly clipboard: AsyncClipboard;
  private readonly notify: NotificationSink;
  private readonly createItem: ((mimeType: string, bytes: Uint8Array) => ClipboardItem) | null;
  private disposed = false;
  private inFlightCount = 0;
  private discardedCount = 0;

  constructor(options: AsyncClipboardBridgeOptions) {
    this.clipboard = options.clipboard;
    this.notify = options.notify;
    this.createItem = options.createItem === undefined ? defaultCreateClipboardItem() : options.createItem;
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  /** Outcomes that arrived after {@link dispose}. */
  get discarded(): number {
    return this.discardedCount;
  }

  request(request: ClipboardRequest, token: RequestToken): ClipboardReply {
    if (this.disposed) {
      return { state: "settled", outcome: unavailable("Clipboard bridge is closed.") };
    }
    this.inFlightCount += 1;
    const op = request.op;
    void this.perform(request).then(
      (outcome) => this.deliver(token, op, outcome),
      (err: unknown) => this.deliver(token, op, clipboardFailureOutcome(err)),
    );
    return { state: "pending" };
  }

  dispose(): void {
    this.disposed = true;
  }

  private deliver(token: RequestToken, op: "read" | "write", outcome: ClipboardOutcome): void {
    this.inFlightCount -= 1;
    if (this.disposed) {
      this.discardedCount += 1;
      return;
    }
    if (outcome.status !== "ok") log.debug(`${op} #${token} ${outcome.status}: ${outcome.message}`);
    this.notify({ kind: "clipboard", token, op, outcome });
  }

  private async perform(request: ClipboardRequest): Promise<ClipboardOutcome> {
    if (request.op === "read") {
      return { status: "ok", op: "read", payload: await this.read() };
    }
    await this.write(request.payload);
    return { status: "ok", op: "write" };
  }

  private async read(): Promise<ClipboardPayload> {
    if (!this.clipboard.read) {
      return { kind: "text", text: await this.clipboard.readText() };
    }
    const items = await this.clipboard.read();
    for (const item of items) {
      if (item.types.includes("text/plain")) {
        return { kind: "text", text: await (await item.getType("text/plain")).text() };
      }
      const mimeType = item.types[0];
      if (mimeType !== undefined) {
        const blob = await item.getType(mimeType);
        return { kind: "bytes", mimeType, bytes: new Uint8Array(await blob.arrayBuffer()) };
      }
    }
    return { kind: "text", text: "" };
  }

  private async write(payload: ClipboardPayload): Promise<void> {
    if (payload.kind === "text") {
      await this.clipboard.writeText(payload.text);
      return;
    }
    if (!this.clipboard.write || !this.createItem) {
      throw new Error(`Clipboard cannot hold ${payload.mimeType} data.`);
    }
    await this.clipboard.write([this.createItem(payload.mimeType, payload.bytes)]);
  }
}

/** Used when the host has no clipboard at all, or the build leaves it off. */
export class UnavailableClipboardBridge implements ClipboardBridge {
  constructor(private readonly reason = "Clipboard is not available on this host.") {}

  request(_request: ClipboardRequest, _token: RequestToken): ClipboardReply {
    return { state: "settled", outcome: unavailable(this.reason) };
  }

  dispose(): void {}
}
