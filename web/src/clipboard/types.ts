export type ClipboardPayload =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "bytes"; readonly mimeType: string; readonly bytes: Uint8Array };

export type ClipboardRequest = { readonly op: "read" } | { readonly op: "write"; readonly payload: ClipboardPayload };

export type ClipboardOutcome =
  | { readonly status: "ok"; readonly op: "read"; readonly payload: ClipboardPayload }
  | { readonly status: "ok"; readonly op: "write" }
  | { readonly status: "permission-denied"; readonly message: string }
  | { readonly status: "unavailable"; readonly message: string };

/** Allocated by the frame driver; echoed back on the matching notification. */
export type RequestToken = number;

export type ClipboardReply = { readonly state: "settled"; readonly outcome: ClipboardOutcome } | { readonly state: "pending" };

export interface ClipboardBridge {
  /**
   * Starts a clipboard operation. A `pending` reply means the outcome arrives
   * later as a `clipboard` notification carrying `token`.
   */
  request(request: ClipboardRequest, token: RequestToken): ClipboardReply;
  /** Late outcomes of requests still in flight are discarded. */
  dispose(): void;
}

export function textPayload(text: string): ClipboardPayload {
  return { kind: "text", text };
}

export function settled(outcome: ClipboardOutcome): ClipboardReply {
  return { state: "settled", outcome };
}

export function unavailable(message: string): ClipboardOutcome {
  return { status: "unavailable", message };
}
