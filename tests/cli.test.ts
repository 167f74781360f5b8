import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runCli, USAGE, type CliIO } from "../src/cli/run.js";
import { identity } from "../src/queue/identity.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

type Captured = { out: string[]; err: string[] };

function captureIO(stdin = ""): CliIO & Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    readStdin: async () => stdin,
  };
}

describe("textqueue cli", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  async function run(args: string[], stdin?: string): Promise<{ code: number } & Captured> {
    const io = captureIO(stdin);
    const code = await runCli(args, io);
    return { code, out: io.out, err: io.err };
  }

  it("drives a task through a directory queue", async () => {
    const id = identity("hello");

    expect(await run([root, "upper", "process", "hello"])).toEqual({ code: 0, out: [id], err: [] });
    expect(await run([root, "upper", "status", id])).toEqual({ code: 0, out: ["PENDING"], err: [] });
    expect(await run([root, "upper", "get_task"])).toEqual({ code: 0, out: ["hello"], err: [id] });
    expect(await run([root, "upper", "store_result", id, "-"], "HELLO")).toEqual({ code: 0, out: [], err: [] });
    expect(await run([root, "upper", "result", id])).toEqual({ code: 0, out: ["HELLO"], err: [] });
    expect(await run([root, "upper", "result", id, "--format", "json"])).toEqual({
      code: 0,
      out: [JSON.stringify({ id, result: "HELLO" })],
      err: [],
    });

    const stats = await run([root, "upper", "stats"]);
    expect(stats.code).toBe(0);
    expect(JSON.parse(stats.out[0])).toEqual({ PENDING: 0, STARTED: 0, DONE: 1, ERROR: 0 });
  });

  it("reads documents from stdin", async () => {
    expect(await run([root, "upper", "process", "-"], "piped")).toEqual({ code: 0, out: [identity("piped")], err: [] });
  });

  it("prints nothing when there is no task to claim", async () => {
    expect(await run([root, "upper", "get_task"])).toEqual({ code: 0, out: [], err: [] });
  });

  it("reports queue errors with their kind", async () => {
    expect(await run([root, "upper", "result", "nope"])).toEqual({
      code: 1,
      out: [],
      err: ["NotFound: Unknown document: upper/nope"],
    });

    const id = identity("x");
    await run([root, "upper", "process", "x"]);
    expect(await run([root, "upper", "store_error", id, "E"])).toEqual({
      code: 1,
      out: [],
      err: [`InvalidTransition: Cannot store ERROR for task upper/${id} with status PENDING`],
    });
  });

  it("times out inline processing without a worker", async () => {
    const id = identity("lonely");
    expect(await run([root, "upper", "process_inline", "lonely", "--timeout", "20"])).toEqual({
      code: 1,
      out: [],
      err: [`Timeout: Task upper/${id} still PENDING after 20ms`],
    });
  });

  it("rejects bad invocations with exit code 2", async () => {
    expect((await run([root, "upper"])).code).toBe(2);
    expect((await run([root, "upper", "frobnicate"])).err[0]).toBe("Unknown action: frobnicate");
    expect((await run([root, "upper", "frobnicate"])).code).toBe(2);
    expect((await run([root, "upper", "process_inline", "x", "--timeout", "soon"])).code).toBe(2);
    expect((await run([root, "upper", "status", "--bogus"])).code).toBe(2);
  });

  it("prints usage on --help", async () => {
    expect(await run(["--help"])).toEqual({ code: 0, out: [USAGE], err: [] });
  });
});
