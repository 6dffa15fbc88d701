export { Bucket, createBucket } from "./bucket";
export type { BucketPolicyOptions, CreatedBucket } from "./bucket";
export { AdminCapability } from "./capability";
export type {
  ContentObjectResolver,
  ContentStore,
  HandoffMechanism,
  RenewalCollaborators,
  TimeSource,
} from "./collaborators";
export type { BucketDependencies, BucketOptions } from "./config";
export { bucketOptionsFromConfig, parseBucketOptions } from "./config/schema";
export type { ParsedBucketOptions } from "./config/schema";
export * from "./errors";
export { Payment } from "./payment";
export { assertSlotKey, parseSlotKey, SLOT_KEY_BITS } from "./types";
export type {
  BucketId,
  BucketRecord,
  BucketSnapshot,
  CapabilityId,
  CapabilityRecord,
  ContentObject,
  ReceivePolicy,
  RenewalFunding,
  RenewalReceipt,
  SlotKey,
  SlotState,
} from "./types";
export { createBucketLogger, isBucketLogger } from "./observability/logs";
export type { BucketLogFields, BucketLogger } from "./observability/logs";
export { BucketMetrics } from "./observability/metrics";
export {
  createBucketRepository,
  createInMemoryBucketRepository,
  createPostgresBucketRepository,
  parseBucketSnapshot,
  restoreBucket,
  runMigrations,
  sqlMigrations,
  SQL_MIGRATIONS,
} from "./persistence";
export type { BucketRepository, RestoreOptions } from "./persistence";
export { sweepOptionsFromConfig, sweepRenewals } from "./maintenance/sweep";
export type { SweepFailure, SweepOptions, SweepReport } from "./maintenance/sweep";
