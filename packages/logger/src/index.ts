import pino from "pino";

export { type CreateLoggerOptions, createNodeLogger, flushLogger, withRunContext } from "./node";
export * from "./redaction";
export type * from "./types";

export type { DestinationStream, Logger } from "pino";
export { pino };
