import crypto from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { DEFAULT_BODY_LIMIT, DEFAULT_RATE_LIMIT_PER_MINUTE } from "../config/env.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { isQueueError, QueueError, toDescriptor, type QueueErrorKind } from "../queue/errors.js";
import type { QueueStatistics, TaskQueue } from "../queue/types.js";
import { ERROR_CONTENT_TYPE, ID_HEADER, parseFlag, STATUS_CODES, STATUS_HEADER } from "../queue/wire.js";

export interface QueueAppOptions {
  queue: TaskQueue;
  registry: ModuleRegistry;
  // requests per minute per client; 0 disables the limiter
  rateLimitPerMinute?: number;
  bodyLimit?: string;
  logRequests?: boolean;
}

/* ======================================================
   Request schemas
====================================================== */
const BulkIdsSchema = z.array(z.string().min(1)).min(1);

const BulkDocsSchema = z.union([
  z.array(z.string()).min(1),
  z
    .record(z.string(), z.string())
    .refine((docs) => Object.keys(docs).length > 0, { message: "Empty request" }),
]);

export const ERROR_HTTP_CODES: Record<QueueErrorKind, number> = {
  UnknownModule: 404,
  NotFound: 404,
  NotReady: 409,
  InvalidTransition: 409,
  InvalidArgument: 400,
  ProcessingFailed: 500,
  StorageError: 500,
  RemoteError: 502,
  Timeout: 504,
};

function sendError(res: Response, e: unknown): void {
  const code = isQueueError(e) ? ERROR_HTTP_CODES[e.kind] : 500;
  if (code >= 500 && !isQueueError(e, "ProcessingFailed")) {
    console.error("[queue-server] request failed:", e);
  }
  res.status(code).json(toDescriptor(e));
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not await handlers: every route answers its own failures
function route(fn: Handler) {
  return (req: Request, res: Response) => {
    fn(req, res).catch((e: unknown) => sendError(res, e));
  };
}

function textBody(req: Request): string {
  return typeof req.body === "string" ? req.body : "";
}

function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown, hint: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new QueueError("InvalidArgument", hint);
  return parsed.data;
}

function contentType(req: Request): string {
  return (req.headers["content-type"] || "").split(";")[0].trim().toLowerCase();
}

/**
 * HTTP surface of the queue: the /modules protocol spoken by HttpQueue,
 * served over any TaskQueue backend.
 */
export function createApp(opts: QueueAppOptions): express.Express {
  const { queue, registry } = opts;
  const bodyLimit = opts.bodyLimit ?? DEFAULT_BODY_LIMIT;
  const rateLimitPerMinute = opts.rateLimitPerMinute ?? DEFAULT_RATE_LIMIT_PER_MINUTE;

  const app = express();
  app.disable("x-powered-by");
  app.use(helmet());

  // ---------------------------------------------------------------------------
  // Logging (request id + timing)
  // ---------------------------------------------------------------------------
  if (opts.logRequests ?? true) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const rid = crypto.randomUUID();
      const start = Date.now();
      res.on("finish", () => {
        console.log(
          JSON.stringify({
            rid,
            method: req.method,
            path: req.originalUrl,
            status: res.statusCode,
            ms: Date.now() - start,
          })
        );
      });
      next();
    });
  }

  if (rateLimitPerMinute > 0) {
    app.use(
      rateLimit({
        windowMs: 60_000,
        limit: rateLimitPerMinute,
        standardHeaders: true,
        legacyHeaders: false,
      })
    );
  }

  const text = express.text({ type: () => true, limit: bodyLimit });
  const json = express.json({ type: () => true, limit: bodyLimit, strict: false });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  const modules = express.Router();

  modules.get(
    "/",
    route(async (_req, res) => {
      const out: Array<{ name: string; statistics: QueueStatistics }> = [];
      for (const name of registry.names()) {
        out.push({ name, statistics: await queue.statistics(name) });
      }
      res.json(out);
    })
  );

  // ---------------------------------------------------------------------------
  // Bulk (registered before /:module/:id so "bulk" is never read as an id)
  // ---------------------------------------------------------------------------
  modules.post(
    "/:module/bulk/status",
    json,
    route(async (req, res) => {
      const ids = parseBody(BulkIdsSchema, req.body, "Please provide bulk ids as a json list");
      res.json(await queue.bulkStatus(req.params.module, ids));
    })
  );

  modules.post(
    "/:module/bulk/result",
    json,
    route(async (req, res) => {
      const ids = parseBody(BulkIdsSchema, req.body, "Please provide bulk ids as a json list");
      res.json(await queue.bulkResult(req.params.module, ids, queryString(req, "format")));
    })
  );

  modules.post(
    "/:module/bulk/process",
    json,
    route(async (req, res) => {
      const module = req.params.module;
      registry.require(module);
      const body = parseBody(BulkDocsSchema, req.body, "Please provide bulk docs as a json list or {id: doc} dict");
      const docs = Array.isArray(body) ? body : Object.values(body);
      const ids = Array.isArray(body) ? undefined : Object.keys(body);
      const out = await queue.bulkSubmit(module, docs, {
        ids,
        resetError: parseFlag(req.query.reset_error),
        resetPending: parseFlag(req.query.reset_pending),
      });
      res.json(out);
    })
  );

  modules.get(
    "/:module/bulk/statistics",
    route(async (req, res) => {
      res.json(await queue.statistics(req.params.module));
    })
  );

  // ---------------------------------------------------------------------------
  // Single task
  // ---------------------------------------------------------------------------
  modules.post(
    "/:module",
    text,
    route(async (req, res) => {
      const module = req.params.module;
      registry.require(module);
      const id = await queue.submit(module, textBody(req), queryString(req, "id"));
      res
        .status(202)
        .set("Location", `${req.baseUrl}/${encodeURIComponent(module)}/${encodeURIComponent(id)}`)
        .set(ID_HEADER, id)
        .type("text/plain")
        .send(id + "\n");
    })
  );

  // HEAD would otherwise fall through to the claim handler below
  modules.head("/:module", (_req: Request, res: Response) => {
    res.status(405).end();
  });

  modules.get(
    "/:module",
    route(async (req, res) => {
      const module = req.params.module;
      registry.require(module);
      const task = await queue.claim(module);
      if (!task) {
        res.status(404).type("text/plain").send(`Queue ${module} empty!\n`);
        return;
      }
      res
        .status(200)
        .set("Location", `${req.baseUrl}/${encodeURIComponent(module)}/${encodeURIComponent(task.id)}`)
        .set(ID_HEADER, task.id)
        .type("text/plain")
        .send(task.doc);
    })
  );

  modules.head(
    "/:module/:id",
    route(async (req, res) => {
      const status = await queue.status(req.params.module, req.params.id);
      res.status(STATUS_CODES[status]).set(STATUS_HEADER, status).end();
    })
  );

  modules.get(
    "/:module/:id",
    route(async (req, res) => {
      const format = queryString(req, "format");
      const outcome = await queue.result(req.params.module, req.params.id, format);
      if (!outcome.ok) {
        sendError(res, outcome.error);
        return;
      }
      res
        .status(200)
        .type(format === "json" ? "application/json" : "text/plain")
        .send(outcome.value);
    })
  );

  modules.put(
    "/:module/:id",
    text,
    route(async (req, res) => {
      const { module, id } = req.params;
      if (contentType(req) === ERROR_CONTENT_TYPE) {
        await queue.storeError(module, id, textBody(req));
      } else {
        await queue.storeResult(module, id, textBody(req));
      }
      res.status(204).end();
    })
  );

  app.use("/modules", modules);

  // body-parser failures (malformed JSON, oversized bodies) carry an HTTP status
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    const status = err instanceof Error ? Reflect.get(err, "status") : undefined;
    if (typeof status === "number" && status >= 400 && status < 500) {
      res.status(status).json({ kind: "InvalidArgument", message: err instanceof Error ? err.message : "Bad request" });
      return;
    }
    sendError(res, err);
  });

  return app;
}
