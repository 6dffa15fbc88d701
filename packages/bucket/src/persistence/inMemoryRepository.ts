import type { BucketId, BucketSnapshot } from "../types";

export interface BucketRepository {
  save(snapshot: BucketSnapshot): Promise<void>;
  load(bucketId: BucketId): Promise<BucketSnapshot | null>;
  delete(bucketId: BucketId): Promise<void>;
}

const clone = (snapshot: BucketSnapshot): BucketSnapshot => ({
  bucket: { ...snapshot.bucket, slots: { ...snapshot.bucket.slots } },
  capability: { ...snapshot.capability },
});

export const createInMemoryBucketRepository = (seed: BucketSnapshot[] = []): BucketRepository => {
  const byId = new Map<BucketId, BucketSnapshot>();
  seed.forEach((snapshot) => byId.set(snapshot.bucket.id, clone(snapshot)));

  return {
    async save(snapshot) {
      byId.set(snapshot.bucket.id, clone(snapshot));
    },
    async load(bucketId) {
      const stored = byId.get(bucketId);
      return stored ? clone(stored) : null;
    },
    async delete(bucketId) {
      byId.delete(bucketId);
    },
  };
};
