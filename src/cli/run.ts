import { parseArgs } from "node:util";
import { createDefaultRegistry } from "../modules/registry.js";
import { connectQueue } from "../queue/connect.js";
import { isQueueError, safeErr } from "../queue/errors.js";

export const USAGE = `Usage: textqueue <address> <module> <action> [args] [--format F] [--timeout MS] [--verbose]

Actions:
  status <id>
  result <id>               (--format converts through the module)
  process <doc|->
  process_inline <doc|->    (--timeout gives up after MS milliseconds)
  get_task
  store_result <id> <text|->
  store_error <id> <text|->
  stats

<address> is a queue directory or an http(s):// queue service URL; "-" reads stdin.
`;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  readStdin: () => Promise<string>;
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: "string" },
      timeout: { type: "string" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * Runs one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    io.stderr(safeErr(e));
    io.stderr(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (values.verbose) process.env.DEBUG = "true";

  const [address, module, action, ...rest] = positionals;
  if (!address || !module || !action) {
    io.stderr(USAGE);
    return 2;
  }

  const timeoutMs = values.timeout === undefined ? undefined : Number(values.timeout);
  if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs >= 0)) {
    io.stderr(`Invalid --timeout: ${values.timeout}`);
    return 2;
  }

  const arg = async (i: number, name: string): Promise<string> => {
    const v = rest[i];
    if (v === undefined) throw new Error(`${action}: missing <${name}>`);
    return v === "-" ? io.readStdin() : v;
  };

  const queue = connectQueue(address, { registry: createDefaultRegistry() });

  try {
    switch (action) {
      case "status":
        io.stdout(await queue.status(module, await arg(0, "id")));
        return 0;

      case "result":
      case "process_inline": {
        const outcome =
          action === "result"
            ? await queue.result(module, await arg(0, "id"), values.format)
            : await queue.processInline(module, await arg(0, "doc"), { timeoutMs });
        if (!outcome.ok) {
          io.stderr(`${outcome.error.kind}: ${outcome.error.message}`);
          return 1;
        }
        io.stdout(outcome.value);
        return 0;
      }

      case "process":
        io.stdout(await queue.submit(module, await arg(0, "doc")));
        return 0;

      case "get_task": {
        const task = await queue.claim(module);
        if (task) {
          io.stderr(task.id);
          io.stdout(task.doc);
        }
        return 0;
      }

      case "store_result":
        await queue.storeResult(module, await arg(0, "id"), await arg(1, "text"));
        return 0;

      case "store_error":
        await queue.storeError(module, await arg(0, "id"), await arg(1, "text"));
        return 0;

      case "stats":
        io.stdout(JSON.stringify(await queue.statistics(module), null, 2));
        return 0;

      default:
        io.stderr(`Unknown action: ${action}`);
        io.stderr(USAGE);
        return 2;
    }
  } catch (e) {
    io.stderr(isQueueError(e) ? `${e.kind}: ${e.message}` : safeErr(e));
    return 1;
  }
}
