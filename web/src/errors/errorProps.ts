// Foreign errors (DOMException, Node system errors, whatever a host callback
// rejects with) are inspected through these helpers. Property getters on such
// values may throw, so every read is guarded.

function readProp(err: unknown, key: "code" | "name" | "message" | "cause"): unknown {
  if (!err || (typeof err !== "object" && typeof err !== "function")) return undefined;
  try {
    return Reflect.get(err, key);
  } catch {
    return undefined;
  }
}

export function tryGetErrorCode(err: unknown): string | undefined {
  const code = readProp(err, "code");
  return typeof code === "string" ? code : undefined;
}

/** `DOMException` reports its kind through `name` (`NotAllowedError`, ...). */
export function tryGetErrorName(err: unknown): string | undefined {
  const name = readProp(err, "name");
  return typeof name === "string" ? name : undefined;
}

export function tryGetErrorCause(err: unknown): unknown | undefined {
  return readProp(err, "cause");
}

export function isErrorInstance(value: unknown): value is Error {
  if (!value || typeof value !== "object") return false;
  try {
    return value instanceof Error;
  } catch {
    return false;
  }
}

export function errorMessage(err: unknown): string {
  const message = readProp(err, "message");
  if (typeof message === "string" && message.length > 0) return message;
  if (typeof err === "string") return err;
  return String(tryGetErrorName(err) ?? "Error");
}
