export * from "./queue/errors.js";
export * from "./queue/types.js";
export { identity, isTaskId } from "./queue/identity.js";
export { QueueClient, sleep } from "./queue/client.js";
export { FsQueue, STATUS_DIRS, type FsQueueOptions } from "./queue/fsQueue.js";
export { HttpQueue, type FetchImplementation, type HttpQueueOptions } from "./queue/httpQueue.js";
export { connectQueue, openBackend, isRemoteAddress, type ConnectOptions, type QueueBackend } from "./queue/connect.js";
export { ERROR_CONTENT_TYPE, STATUS_CODES } from "./queue/wire.js";
export type { TextModule } from "./modules/types.js";
export { ModuleRegistry, createModuleRegistry, createDefaultRegistry, BUILTIN_MODULES } from "./modules/registry.js";
export { createApp, type QueueAppOptions } from "./server/app.js";
export { runWorker, runWorkerTick, type WorkerOptions } from "./worker/runner.js";
