import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createDefaultRegistry } from "../src/modules/registry.js";
import { FsQueue } from "../src/queue/fsQueue.js";
import { identity } from "../src/queue/identity.js";
import type { ClaimedTask } from "../src/queue/types.js";
import { delay, makeTempDir, removeTempDir, tickingClock } from "./helpers.js";

// Stalls the first status lookup until released, so a submit can be caught
// between its check and its write
class StallingQueue extends FsQueue {
  stalled = false;

  constructor(
    root: string,
    private readonly gate: Promise<void>
  ) {
    super(root, { nowMs: tickingClock() });
  }

  async status(module: string, id: string) {
    const status = await super.status(module, id);
    if (!this.stalled) {
      this.stalled = true;
      await this.gate;
    }
    return status;
  }
}

describe("FsQueue", () => {
  let root: string;
  let q: FsQueue;

  beforeEach(async () => {
    root = await makeTempDir();
    q = new FsQueue(root, { registry: createDefaultRegistry(), nowMs: tickingClock() });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe("lifecycle", () => {
    it("walks a task from submission to result", async () => {
      const id = await q.submit("echo", "hello");
      expect(id).toBe(identity("hello"));
      expect(await q.status("echo", id)).toBe("PENDING");

      expect(await q.claim("echo")).toEqual({ id, doc: "hello" });
      expect(await q.status("echo", id)).toBe("STARTED");

      await q.storeResult("echo", id, "HELLO");
      expect(await q.status("echo", id)).toBe("DONE");
      expect(await q.result("echo", id)).toEqual({ ok: true, value: "HELLO" });
    });

    it("lays records out as one directory per state", async () => {
      const id = await q.submit("echo", "hello");
      expect(fs.readFileSync(path.join(root, "echo", "queue", id), "utf8")).toBe("hello");

      await q.claim("echo");
      expect(fs.existsSync(path.join(root, "echo", "queue", id))).toBe(false);
      expect(fs.readFileSync(path.join(root, "echo", "inprogress", id), "utf8")).toBe("hello");

      await q.storeResult("echo", id, "HELLO");
      expect(fs.existsSync(path.join(root, "echo", "inprogress", id))).toBe(false);
      expect(fs.readFileSync(path.join(root, "echo", "results", id), "utf8")).toBe("HELLO");
    });

    it("answers UNKNOWN and NotFound for missing ids", async () => {
      expect(await q.status("echo", "nonexistent")).toBe("UNKNOWN");
      const outcome = await q.result("echo", "nonexistent");
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe("NotFound");
        expect(outcome.error.message).toBe("Unknown document: echo/nonexistent");
      }
    });

    it("reports NotReady while a task is pending or started", async () => {
      const id = await q.submit("echo", "hello");
      const pending = await q.result("echo", id);
      expect(pending.ok ? null : pending.error.kind).toBe("NotReady");

      await q.claim("echo");
      const started = await q.result("echo", id);
      expect(started.ok ? null : started.error.message).toBe(`Status of echo/${id} is STARTED`);
    });

    it("reports stored errors as ProcessingFailed", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      await q.storeError("echo", id, "E");

      expect(await q.status("echo", id)).toBe("ERROR");
      const outcome = await q.result("echo", id);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe("ProcessingFailed");
        expect(outcome.error.message).toBe("E");
      }
    });
  });

  describe("submit", () => {
    it("is idempotent on content", async () => {
      const first = await q.submit("echo", "hello");
      const second = await q.submit("echo", "hello");
      expect(second).toBe(first);
      expect(await q.statistics("echo")).toEqual({ PENDING: 1, STARTED: 0, DONE: 0, ERROR: 0 });
    });

    it("does not touch a task that is already in progress", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      expect(await q.submit("echo", "hello")).toBe(id);
      expect(await q.status("echo", id)).toBe("STARTED");
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 1, DONE: 0, ERROR: 0 });
    });

    it("honours explicit ids verbatim", async () => {
      expect(await q.submit("echo", "some text", "doc-1")).toBe("doc-1");
      expect(await q.claim("echo")).toEqual({ id: "doc-1", doc: "some text" });
    });

    it("accepts explicit ids up to the full segment length", async () => {
      const id = "a".repeat(250);
      expect(await q.submit("echo", "long", id)).toBe(id);
      expect(await q.claim("echo")).toEqual({ id, doc: "long" });
    });

    it("does not revive a task claimed while a duplicate submit was in flight", async () => {
      let release = () => {};
      const slow = new StallingQueue(root, new Promise<void>((r) => (release = r)));
      const first = slow.submit("echo", "hello");
      while (!slow.stalled) await delay(1);

      const id = await q.submit("echo", "hello");
      expect((await q.claim("echo"))?.id).toBe(id);

      release();
      expect(await first).toBe(id);
      expect(await q.claim("echo")).toBeNull();
      expect(await q.status("echo", id)).toBe("STARTED");
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 1, DONE: 0, ERROR: 0 });
    });

    it("keeps module namespaces apart", async () => {
      const id = await q.submit("a", "hello");
      expect(await q.status("a", id)).toBe("PENDING");
      expect(await q.status("b", id)).toBe("UNKNOWN");
      expect(await q.claim("b")).toBeNull();
    });

    it("rejects ids that are not a single safe path segment", async () => {
      await expect(q.submit("echo", "x", "../escape")).rejects.toMatchObject({ kind: "InvalidArgument" });
      await expect(q.submit("echo", "x", ".hidden")).rejects.toMatchObject({ kind: "InvalidArgument" });
      await expect(q.submit("../echo", "x")).rejects.toMatchObject({ kind: "InvalidArgument" });
      expect(await q.status("echo", "../escape")).toBe("UNKNOWN");
    });
  });

  describe("claim", () => {
    it("returns null when the module has never been used", async () => {
      expect(await q.claim("echo")).toBeNull();
    });

    it("hands out the oldest submission first", async () => {
      const a = await q.submit("echo", "a");
      const b = await q.submit("echo", "b");
      const c = await q.submit("echo", "c");

      expect((await q.claim("echo"))?.id).toBe(a);
      expect((await q.claim("echo"))?.id).toBe(b);
      expect((await q.claim("echo"))?.id).toBe(c);
      expect(await q.claim("echo")).toBeNull();
    });

    it("breaks timestamp ties by id", async () => {
      const frozen = new FsQueue(root, { nowMs: () => 1_700_000_000_000 });
      const ids = [await frozen.submit("echo", "x"), await frozen.submit("echo", "y")];
      const expected = [...ids].sort();

      expect((await frozen.claim("echo"))?.id).toBe(expected[0]);
      expect((await frozen.claim("echo"))?.id).toBe(expected[1]);
    });

    it("never hands the same task to concurrent claimers", async () => {
      const docs = Array.from({ length: 20 }, (_, i) => `document ${i}`);
      for (const doc of docs) await q.submit("echo", doc);

      // two clients on the same directory, racing
      const other = new FsQueue(root);
      const claims = await Promise.all(
        Array.from({ length: 25 }, (_, i) => (i % 2 === 0 ? q.claim("echo") : other.claim("echo")))
      );

      const won = claims.filter((c): c is ClaimedTask => c !== null);
      expect(won).toHaveLength(20);
      expect(new Set(won.map((c) => c.id)).size).toBe(20);
      expect(new Set(won.map((c) => c.doc))).toEqual(new Set(docs));
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 20, DONE: 0, ERROR: 0 });
    });

    it("ignores in-flight temp files", async () => {
      fs.mkdirSync(path.join(root, "echo", "queue"), { recursive: true });
      fs.writeFileSync(path.join(root, "echo", "queue", ".0xabc.tmp"), "half a docu");

      expect(await q.claim("echo")).toBeNull();
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 0, DONE: 0, ERROR: 0 });
    });

    it("drops pending duplicates of started or finished tasks", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      const pending = path.join(root, "echo", "queue", id);
      fs.writeFileSync(pending, "hello");

      expect(await q.claim("echo")).toBeNull();
      expect(fs.existsSync(pending)).toBe(false);

      await q.storeResult("echo", id, "HELLO");
      fs.writeFileSync(pending, "hello");
      expect(await q.claim("echo")).toBeNull();
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 0, DONE: 1, ERROR: 0 });
      expect(await q.result("echo", id)).toEqual({ ok: true, value: "HELLO" });
    });

    it("claims lazily in batches", async () => {
      await q.bulkSubmit("echo", ["a", "b", "c"]);

      const firstTwo: string[] = [];
      for await (const task of q.claimMany("echo", 2)) firstTwo.push(task.doc);
      expect(firstTwo).toEqual(["a", "b"]);

      const rest: string[] = [];
      for await (const task of q.claimMany("echo", 5)) rest.push(task.doc);
      expect(rest).toEqual(["c"]);
    });
  });

  describe("store", () => {
    it("wraps failed writes as StorageError and leaves no temp files", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      // a directory where the error record should go makes the final rename fail
      const errors = path.join(root, "echo", "errors");
      fs.mkdirSync(path.join(errors, id));

      await expect(q.storeError("echo", id, "E")).rejects.toMatchObject({ kind: "StorageError" });
      expect(fs.readdirSync(errors)).toEqual([id]);
    });

    it("refuses outcomes for pending or unknown tasks", async () => {
      const id = await q.submit("echo", "hello");
      await expect(q.storeResult("echo", id, "X")).rejects.toMatchObject({ kind: "InvalidTransition" });
      await expect(q.storeError("echo", "nonexistent", "E")).rejects.toMatchObject({ kind: "InvalidTransition" });
      expect(await q.status("echo", id)).toBe("PENDING");
    });

    it("replaces an error with a later result", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      await q.storeError("echo", id, "E");
      await q.storeResult("echo", id, "X");

      expect(await q.status("echo", id)).toBe("DONE");
      expect(await q.result("echo", id)).toEqual({ ok: true, value: "X" });
      expect(fs.existsSync(q.file("echo", "ERROR", id))).toBe(false);
    });

    it("replaces a result with a later error", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      await q.storeResult("echo", id, "X");
      await q.storeError("echo", id, "E2");

      expect(await q.status("echo", id)).toBe("ERROR");
      expect(fs.existsSync(q.file("echo", "DONE", id))).toBe(false);
      expect(await q.statistics("echo")).toEqual({ PENDING: 0, STARTED: 0, DONE: 0, ERROR: 1 });
    });

    it("overwrites a result with a newer one", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      await q.storeResult("echo", id, "first");
      await q.storeResult("echo", id, "second");
      expect(await q.result("echo", id)).toEqual({ ok: true, value: "second" });
    });
  });

  describe("result formats", () => {
    it("converts through the module", async () => {
      const id = await q.submit("upper", "hi");
      await q.claim("upper");
      await q.storeResult("upper", id, "HI");

      expect(await q.result("upper", id, "json")).toEqual({ ok: true, value: JSON.stringify({ id, result: "HI" }) });
      const bad = await q.result("upper", id, "xml");
      expect(bad.ok ? null : bad.error.kind).toBe("InvalidArgument");
    });

    it("needs a registered module to convert", async () => {
      const id = await q.submit("echo", "hi");
      await q.claim("echo");
      await q.storeResult("echo", id, "HI");

      const outcome = await q.result("echo", id, "json");
      expect(outcome.ok ? null : outcome.error.kind).toBe("UnknownModule");

      const bare = new FsQueue(root);
      const noRegistry = await bare.result("echo", id, "json");
      expect(noRegistry.ok ? null : noRegistry.error.kind).toBe("UnknownModule");
    });
  });

  describe("bulk", () => {
    it("returns ids in input order", async () => {
      expect(await q.bulkSubmit("echo", ["a", "b"])).toEqual([identity("a"), identity("b")]);
    });

    it("uses explicit ids position by position", async () => {
      expect(await q.bulkSubmit("echo", ["a", "b"], { ids: ["2", "1"] })).toEqual(["2", "1"]);
      expect((await q.claim("echo"))?.doc).toBe("a");
      await expect(q.bulkSubmit("echo", ["a", "b"], { ids: ["1"] })).rejects.toMatchObject({
        kind: "InvalidArgument",
      });
    });

    it("reports statuses for exactly the requested ids", async () => {
      const id = await q.submit("echo", "hello");
      expect(await q.bulkStatus("echo", [id, "nope"])).toEqual({ [id]: "PENDING", nope: "UNKNOWN" });
    });

    it("reports results and error descriptors side by side", async () => {
      const [good, bad] = await q.bulkSubmit("echo", ["good", "bad"]);
      await q.claim("echo");
      await q.claim("echo");
      await q.storeResult("echo", good, "GOOD");
      await q.storeError("echo", bad, "kaput");

      expect(await q.bulkResult("echo", [good, bad, "nope"])).toEqual({
        [good]: "GOOD",
        [bad]: { kind: "ProcessingFailed", message: "kaput" },
        nope: { kind: "NotFound", message: "Unknown document: echo/nope" },
      });
    });

    it("requeues errored tasks only when asked", async () => {
      const id = await q.submit("echo", "hello");
      await q.claim("echo");
      await q.storeError("echo", id, "E");

      await q.bulkSubmit("echo", ["hello"]);
      expect(await q.status("echo", id)).toBe("ERROR");

      await q.bulkSubmit("echo", ["hello"], { resetError: true });
      expect(await q.status("echo", id)).toBe("PENDING");
      expect(fs.existsSync(q.file("echo", "ERROR", id))).toBe(false);
      expect(await q.claim("echo")).toEqual({ id, doc: "hello" });
    });

    it("moves reset pending tasks to the back of the queue", async () => {
      const a = await q.submit("echo", "a");
      const b = await q.submit("echo", "b");

      await q.bulkSubmit("echo", ["a"], { resetPending: true });
      expect((await q.claim("echo"))?.id).toBe(b);
      expect((await q.claim("echo"))?.id).toBe(a);
    });
  });

  describe("processInline", () => {
    it("waits for a worker to store the result", async () => {
      const pending = q.processInline("upper", "hi", { intervalMs: 5, timeoutMs: 5_000 });

      let task: ClaimedTask | null = null;
      while (!task) {
        task = await q.claim("upper");
        if (!task) await delay(2);
      }
      await q.storeResult("upper", task.id, task.doc.toUpperCase());

      expect(await pending).toEqual({ ok: true, value: "HI" });
    });

    it("serves an already processed document without waiting", async () => {
      const id = await q.submit("upper", "hi");
      await q.claim("upper");
      await q.storeResult("upper", id, "HI");

      expect(await q.processInline("upper", "hi", { timeoutMs: 0 })).toEqual({ ok: true, value: "HI" });
    });

    it("returns the stored error of a failed document", async () => {
      const id = await q.submit("upper", "hi");
      await q.claim("upper");
      await q.storeError("upper", id, "kaput");

      const outcome = await q.processInline("upper", "hi");
      expect(outcome.ok ? null : outcome.error.kind).toBe("ProcessingFailed");
    });

    it("gives up at the deadline", async () => {
      const outcome = await q.processInline("upper", "nobody home", { intervalMs: 5, timeoutMs: 30 });
      expect(outcome.ok ? null : outcome.error.kind).toBe("Timeout");
      expect(await q.status("upper", identity("nobody home"))).toBe("PENDING");
    });

    it("stops when the caller aborts", async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);
      const outcome = await q.processInline("upper", "nobody home", { intervalMs: 1_000, signal: controller.signal });
      expect(outcome.ok ? null : outcome.error.kind).toBe("Timeout");
    });
  });
});
