import pino from "pino";

export interface BucketLogFields {
  op: string;
  bucketId: string;
  /** Absent on the record that opens an operation. */
  durationMs?: number;
  key?: string;
  code?: string;
}

export interface BucketLogger {
  debug(fields: BucketLogFields & Record<string, unknown>): void;
  info(fields: BucketLogFields & Record<string, unknown>): void;
  warn(fields: BucketLogFields & Record<string, unknown>): void;
  error(fields: BucketLogFields & Record<string, unknown>): void;
}

export interface BucketLoggerConfig {
  level: string;
}

const REDACTED_FIELDS = ["capability", "payment", "*.capability", "*.payment"];

export function isBucketLogger(value: unknown): value is BucketLogger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    "info" in value &&
    "warn" in value &&
    "error" in value
  );
}

export function createBucketLogger(
  { level }: BucketLoggerConfig,
  destination?: pino.DestinationStream
): BucketLogger {
  const base = pino({ level, name: "bucket", redact: REDACTED_FIELDS }, destination);
  return {
    debug: (fields) => base.debug(fields),
    info: (fields) => base.info(fields),
    warn: (fields) => base.warn(fields),
    error: (fields) => base.error(fields),
  };
}
