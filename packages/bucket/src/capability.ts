import { randomUUID } from "node:crypto";
import { ValidationFailedError } from "./errors";
import type { BucketId, CapabilityId, CapabilityRecord } from "./types";

const ISSUER: unique symbol = Symbol("larder.capability.issuer");

const issued = new WeakSet<AdminCapability>();

// At most one reachable capability per bucket id in this process.
const live = new Map<BucketId, WeakRef<AdminCapability>>();
const released = new FinalizationRegistry<BucketId>((bucketId) => {
  if (!live.get(bucketId)?.deref()) {
    live.delete(bucketId);
  }
});

/**
 * Authority over exactly one bucket. Instances come only from bucket creation
 * or restore; the constructor demands a module-private key, and the bucket
 * additionally checks the instance against the issued set, so neither `new`
 * nor a structurally identical object passes authorization.
 */
export class AdminCapability {
  public readonly id: CapabilityId;
  public readonly boundBucket: BucketId;

  constructor(key: typeof ISSUER, id: CapabilityId, boundBucket: BucketId) {
    if (key !== ISSUER) {
      throw new TypeError("AdminCapability cannot be constructed directly");
    }
    this.id = id;
    this.boundBucket = boundBucket;
    Object.freeze(this);
  }

  toRecord(): CapabilityRecord {
    return { id: this.id, boundBucket: this.boundBucket };
  }

  toJSON(): CapabilityRecord {
    return this.toRecord();
  }
}

/**
 * Throws `ValidationFailedError` while another capability for `boundBucket`
 * is still reachable, so a restore cannot duplicate a live authority.
 */
export function issueCapability(boundBucket: BucketId, id: CapabilityId = randomUUID()): AdminCapability {
  if (live.get(boundBucket)?.deref()) {
    throw new ValidationFailedError("A capability for this bucket is already live", { bucketId: boundBucket });
  }
  const capability = new AdminCapability(ISSUER, id, boundBucket);
  issued.add(capability);
  live.set(boundBucket, new WeakRef(capability));
  released.register(capability, boundBucket);
  return capability;
}

export function authorizes(capability: unknown, bucketId: BucketId): boolean {
  return (
    capability instanceof AdminCapability &&
    issued.has(capability) &&
    capability.boundBucket === bucketId
  );
}
