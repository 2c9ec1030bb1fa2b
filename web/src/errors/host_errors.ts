export type FramehostErrorCode =
  | "presentation_lost"
  | "clipboard_unavailable"
  | "clipboard_permission_denied"
  | "accessibility_unavailable"
  | "startup_failed";

export class FramehostError extends Error {
  readonly code: FramehostErrorCode;

  constructor(code: FramehostErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The host surface is gone (window closed, terminal hung up, canvas detached). Fatal. */
export class PresentationError extends FramehostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("presentation_lost", message, options);
  }
}

export class ClipboardError extends FramehostError {
  constructor(
    code: "clipboard_unavailable" | "clipboard_permission_denied",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
  }
}

/** Speech or live-region output failed. Never escapes the accessibility bridge. */
export class AccessibilityUnavailableError extends FramehostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("accessibility_unavailable", message, options);
  }
}

export function isPresentationError(err: unknown): err is PresentationError {
  return err instanceof PresentationError;
}
