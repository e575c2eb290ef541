import { describe, it, expect } from "vitest";
import { Mailbox, MailboxClosedError } from "./mailbox.js";

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("Mailbox", () => {
  it("delivers items in FIFO order", async () => {
    const mailbox = new Mailbox<string>(4);
    await mailbox.send("a");
    await mailbox.send("b");
    expect(await mailbox.receive()).toBe("a");
    expect(await mailbox.receive()).toBe("b");
  });

  it("hands an item straight to a waiting receiver", async () => {
    const mailbox = new Mailbox<string>(1);
    const received = mailbox.receive();
    await mailbox.send("x");
    expect(await received).toBe("x");
    expect(mailbox.size).toBe(0);
  });

  it("makes senders wait while full and admits them as room frees", async () => {
    const mailbox = new Mailbox<string>(2);
    await mailbox.send("a");
    await mailbox.send("b");

    let admitted = false;
    const third = mailbox.send("c").then(() => {
      admitted = true;
    });
    await flush();
    expect(admitted).toBe(false);
    expect(mailbox.pendingSenders).toBe(1);

    expect(await mailbox.receive()).toBe("a");
    await third;
    expect(admitted).toBe(true);
    expect(mailbox.size).toBe(2);
    expect(await mailbox.receive()).toBe("b");
    expect(await mailbox.receive()).toBe("c");
  });

  it("rejects waiting and later senders once closed", async () => {
    const mailbox = new Mailbox<string>(1);
    await mailbox.send("a");
    const blocked = mailbox.send("b");

    mailbox.close();

    await expect(blocked).rejects.toBeInstanceOf(MailboxClosedError);
    await expect(mailbox.send("c")).rejects.toBeInstanceOf(MailboxClosedError);
    expect(mailbox.isClosed).toBe(true);
  });

  it("wakes a waiting receiver with null on close and drops queued items", async () => {
    const empty = new Mailbox<string>(1);
    const waiting = empty.receive();
    empty.close();
    expect(await waiting).toBeNull();

    const full = new Mailbox<string>(1);
    await full.send("dropped");
    full.close();
    expect(await full.receive()).toBeNull();
  });

  it("post ignores capacity until closed", async () => {
    const mailbox = new Mailbox<string>(1);
    await mailbox.send("a");
    expect(mailbox.post("b")).toBe(true);
    expect(mailbox.size).toBe(2);

    mailbox.close();
    expect(mailbox.post("c")).toBe(false);
  });

  it("requires a positive capacity", () => {
    expect(() => new Mailbox<string>(0)).toThrow("mailbox capacity must be a positive integer, got 0");
  });
});
