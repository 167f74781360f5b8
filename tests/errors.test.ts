import { describe, expect, it } from "vitest";

import {
  QueueError,
  errnoCode,
  fail,
  fromDescriptor,
  isErrorDescriptor,
  isQueueError,
  ok,
  toDescriptor,
  unwrap,
} from "../src/queue/errors.js";

describe("queue errors", () => {
  it("unwraps successful outcomes and throws failed ones", () => {
    expect(unwrap(ok("x"))).toBe("x");
    expect(() => unwrap(fail("NotReady", "Status of m/1 is PENDING"))).toThrow("Status of m/1 is PENDING");
  });

  it("narrows by kind", () => {
    const e = new QueueError("RemoteError", "boom", { status: 503, body: "down" });
    expect(isQueueError(e)).toBe(true);
    expect(isQueueError(e, "RemoteError")).toBe(true);
    expect(isQueueError(e, "NotFound")).toBe(false);
    expect(isQueueError(new Error("boom"))).toBe(false);
    expect(e.status).toBe(503);
    expect(e.body).toBe("down");
  });

  it("round-trips through the wire descriptor", () => {
    const d = toDescriptor(new QueueError("ProcessingFailed", "kaput"));
    expect(d).toEqual({ kind: "ProcessingFailed", message: "kaput" });
    expect(isErrorDescriptor(d)).toBe(true);

    const back = fromDescriptor(d);
    expect(back?.kind).toBe("ProcessingFailed");
    expect(back?.message).toBe("kaput");
  });

  it("describes foreign errors as storage errors", () => {
    expect(toDescriptor(new Error("disk full"))).toEqual({ kind: "StorageError", message: "disk full" });
    expect(fromDescriptor({ kind: "Teapot", message: "short and stout" })).toBeNull();
    expect(isErrorDescriptor({ kind: "NotFound" })).toBe(false);
  });

  it("reads errno codes", () => {
    const e = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(errnoCode(e)).toBe("ENOENT");
    expect(errnoCode(new Error("plain"))).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
  });
});
