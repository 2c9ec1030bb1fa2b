import { describe, expect, it } from "vitest";

import { NotificationMailbox, type ClipboardNotification } from "./notifications";

function readDone(token: number, text: string): ClipboardNotification {
  return { kind: "clipboard", token, op: "read", outcome: { status: "ok", op: "read", payload: { kind: "text", text } } };
}

describe("main/notifications", () => {
  it("drains posted notifications in order and empties the mailbox", () => {
    const mailbox = new NotificationMailbox();
    mailbox.post(readDone(1, "a"));
    mailbox.post(readDone(2, "b"));
    expect(mailbox.size).toBe(2);

    expect(mailbox.drain().map((n) => n.token)).toEqual([1, 2]);
    expect(mailbox.size).toBe(0);
    expect(mailbox.drain()).toEqual([]);
  });

  it("freezes what it stores", () => {
    const mailbox = new NotificationMailbox();
    mailbox.post(readDone(1, "a"));
    const [first] = mailbox.drain();
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("counts undelivered and late notifications as discarded after close", () => {
    const mailbox = new NotificationMailbox();
    mailbox.post(readDone(1, "a"));
    mailbox.close();
    mailbox.post(readDone(2, "b"));

    expect(mailbox.discarded).toBe(2);
    expect(mailbox.drain()).toEqual([]);
  });
});
