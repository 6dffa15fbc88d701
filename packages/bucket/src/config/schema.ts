import { z } from "zod";
import type { Config } from "@larder/config";
import { ValidationFailedError } from "../errors";
import type { BucketOptions } from "../config";

const BucketOptionsSchema = z
  .object({
    extensionPeriod: z.number().int().positive(),
    extensionUnlockWindow: z.number().int().nonnegative(),
    renewalFunding: z.enum(["full_balance", "quoted_cost"]).default("full_balance"),
    receivePolicy: z.enum(["auto_reserve", "require_reservation"]).default("auto_reserve"),
    collaboratorTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type ParsedBucketOptions = z.infer<typeof BucketOptionsSchema>;

export function parseBucketOptions(input: BucketOptions | unknown): ParsedBucketOptions {
  const parsed = BucketOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationFailedError(`Invalid bucket options: ${parsed.error.message}`, {
      issues: parsed.error.issues.map((issue) => issue.path.join(".")),
    });
  }
  return parsed.data;
}

export function bucketOptionsFromConfig(config: Config): ParsedBucketOptions {
  return parseBucketOptions({
    extensionPeriod: config.BUCKET_EXTENSION_PERIOD,
    extensionUnlockWindow: config.BUCKET_EXTENSION_UNLOCK_WINDOW,
    renewalFunding: config.BUCKET_RENEWAL_FUNDING,
    receivePolicy: config.BUCKET_RECEIVE_POLICY,
    collaboratorTimeoutMs: config.COLLABORATOR_TIMEOUT_MS,
  });
}
