import { ValidationFailedError } from "./errors";

/** Content key. Fixed-width: 256-bit unsigned. */
export type SlotKey = bigint;

export const SLOT_KEY_BITS = 256;
const SLOT_KEY_LIMIT = 1n << BigInt(SLOT_KEY_BITS);

export type BucketId = string;
export type CapabilityId = string;

/**
 * Reference to an object held by the external content store. The bucket only
 * reads `blobId` and `expirationEpoch`; the store owns every other field and
 * advances `expirationEpoch` on extension.
 */
export interface ContentObject {
  readonly id: string;
  readonly blobId: SlotKey;
  expirationEpoch: number;
  readonly size?: number;
}

export type SlotState = "absent" | "reserved" | "filled";

export type RenewalFunding = "full_balance" | "quoted_cost";

export type ReceivePolicy = "auto_reserve" | "require_reservation";

export interface RenewalReceipt {
  key: SlotKey;
  previousExpiration: number;
  newExpiration: number;
  withdrawn: bigint;
  spent: bigint;
  refunded: bigint;
}

export interface BucketRecord {
  id: BucketId;
  extensionPeriod: number;
  extensionUnlockWindow: number;
  balance: string;
  /** Decimal key → object reference, `null` for reserved slots. */
  slots: Record<string, string | null>;
}

export interface CapabilityRecord {
  id: CapabilityId;
  boundBucket: BucketId;
}

export interface BucketSnapshot {
  bucket: BucketRecord;
  capability: CapabilityRecord;
}

export function assertSlotKey(key: unknown): asserts key is SlotKey {
  if (typeof key !== "bigint" || key < 0n || key >= SLOT_KEY_LIMIT) {
    throw new ValidationFailedError("Slot key must be an unsigned 256-bit integer", {
      key: typeof key === "bigint" ? key.toString() : String(key),
    });
  }
}

export function parseSlotKey(value: string): SlotKey {
  if (!/^[0-9]+$/.test(value)) {
    throw new ValidationFailedError("Slot key must be a decimal string", { key: value });
  }
  const key = BigInt(value);
  assertSlotKey(key);
  return key;
}
