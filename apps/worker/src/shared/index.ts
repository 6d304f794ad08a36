/**
 * Shared Infrastructure Exports
 */

export { createWorkerLogger, SERVICE_NAME, type WorkerLoggerOptions } from "./logger";
