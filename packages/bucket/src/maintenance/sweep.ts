import type { Config } from "@larder/config";
import type { Bucket } from "../bucket";
import type { RenewalCollaborators } from "../collaborators";
import { isBucketError, type BucketErrorCode } from "../errors";
import type { BucketLogger } from "../observability/logs";
import type { RenewalReceipt, SlotKey } from "../types";
import { retry } from "../utils/retry";

export interface SweepOptions {
  /** Attempts per key; only retryable failures are attempted again. */
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: BucketLogger;
}

export interface SweepFailure {
  key: SlotKey;
  code: BucketErrorCode;
  attempts: number;
}

export interface SweepReport {
  renewed: RenewalReceipt[];
  skipped: SlotKey[];
  failed: SweepFailure[];
}

export function sweepOptionsFromConfig(config: Config): SweepOptions {
  return { attempts: config.SWEEP_RETRY_ATTEMPTS };
}

/**
 * Self-funded renewal of every filled key whose unlock window is open. Keys
 * outside their window are skipped; timeouts are retried with backoff.
 */
export async function sweepRenewals(
  bucket: Bucket,
  { contentStore, timeSource }: RenewalCollaborators,
  options: SweepOptions = {}
): Promise<SweepReport> {
  const report: SweepReport = { renewed: [], skipped: [], failed: [] };
  const { logger } = options;
  const start = Date.now();

  for (const key of bucket.keys()) {
    if (bucket.slotState(key) !== "filled") continue;

    let attempts = 0;
    try {
      const receipt = await retry(
        (attempt) => {
          attempts = attempt;
          return bucket.renew(key, contentStore, timeSource);
        },
        {
          attempts: options.attempts ?? 3,
          baseDelayMs: options.baseDelayMs,
          maxDelayMs: options.maxDelayMs,
          shouldRetry: (error) => isBucketError(error) && error.retryable,
        }
      );
      report.renewed.push(receipt);
    } catch (error) {
      if (!isBucketError(error)) throw error;
      if (error.code === "OUTSIDE_UNLOCK_WINDOW") {
        report.skipped.push(key);
        continue;
      }
      report.failed.push({ key, code: error.code, attempts });
      logger?.warn({ op: "sweep", bucketId: bucket.id, key: key.toString(), durationMs: Date.now() - start, code: error.code, attempts });
    }
  }

  logger?.info({
    op: "sweep",
    bucketId: bucket.id,
    durationMs: Date.now() - start,
    renewed: report.renewed.length,
    skipped: report.skipped.length,
    failed: report.failed.length,
  });
  return report;
}
