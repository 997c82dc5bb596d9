import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

// Query text and cell contents are user data; keep them out of structured fields.
const REDACT_PATHS = ["queryText", "query", "cells", "rawText"];

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "cellscope",
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
