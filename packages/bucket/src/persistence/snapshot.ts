import { z } from "zod";
import { Bucket, type BucketPolicyOptions, type CreatedBucket } from "../bucket";
import type { ContentObjectResolver } from "../collaborators";
import type { BucketDependencies } from "../config";
import { isBucketError, PersistenceError, ValidationFailedError } from "../errors";
import type { BucketSnapshot, ContentObject } from "../types";

const BucketSnapshotSchema = z.object({
  bucket: z.object({
    id: z.string().min(1),
    extensionPeriod: z.number().int().positive(),
    extensionUnlockWindow: z.number().int().nonnegative(),
    balance: z.string().regex(/^[0-9]+$/),
    slots: z.record(z.string().regex(/^[0-9]+$/), z.string().min(1).nullable()),
  }),
  capability: z.object({
    id: z.string().min(1),
    boundBucket: z.string().min(1),
  }),
});

export function parseBucketSnapshot(input: unknown): BucketSnapshot {
  const parsed = BucketSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationFailedError(`Invalid bucket snapshot: ${parsed.error.message}`);
  }
  return parsed.data;
}

export interface RestoreOptions {
  policy?: BucketPolicyOptions;
  dependencies?: BucketDependencies;
}

export async function restoreBucket(
  input: BucketSnapshot | unknown,
  resolveObject: ContentObjectResolver,
  { policy, dependencies }: RestoreOptions = {}
): Promise<CreatedBucket> {
  const snapshot = parseBucketSnapshot(input);
  const objects = new Map<string, ContentObject>();
  for (const reference of Object.values(snapshot.bucket.slots)) {
    if (reference === null || objects.has(reference)) continue;
    try {
      objects.set(reference, await resolveObject(reference));
    } catch (error) {
      if (isBucketError(error)) throw error;
      throw new PersistenceError("Could not resolve persisted content object", { reference }, error);
    }
  }
  return Bucket.fromSnapshot(snapshot, objects, policy, dependencies);
}
