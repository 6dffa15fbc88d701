import type { BucketLogger } from "./observability/logs";
import type { BucketMetrics } from "./observability/metrics";
import type { ReceivePolicy, RenewalFunding } from "./types";

export interface BucketOptions {
  /** Epochs a self-funded renewal adds to the expiration. */
  extensionPeriod: number;
  /** Epochs before expiration during which self-funded renewal is allowed. */
  extensionUnlockWindow: number;
  renewalFunding?: RenewalFunding;
  receivePolicy?: ReceivePolicy;
  collaboratorTimeoutMs?: number;
}

export interface BucketDependencies {
  logger?: BucketLogger;
  metrics?: BucketMetrics;
}
