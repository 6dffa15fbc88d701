import { randomUUID } from "node:crypto";
import { loadConfig } from "@larder/config";
import { AdminCapability, authorizes, issueCapability } from "./capability";
import type { ContentStore, HandoffMechanism, TimeSource } from "./collaborators";
import type { BucketDependencies, BucketOptions } from "./config";
import { parseBucketOptions, type ParsedBucketOptions } from "./config/schema";
import {
  AlreadyFilledError,
  BucketError,
  ContentStoreFailureError,
  DuplicateKeyError,
  HandoffResolutionFailureError,
  InsufficientBalanceError,
  isBucketError,
  KeyNotFoundError,
  KeyNotReservedError,
  OutsideUnlockWindowError,
  SlotEmptyError,
  TimeSourceFailureError,
  UnauthorizedError,
  ValidationFailedError,
  type BucketErrorCode,
} from "./errors";
import { createBucketLogger, isBucketLogger, type BucketLogger } from "./observability/logs";
import { BucketMetrics } from "./observability/metrics";
import { Payment } from "./payment";
import {
  assertSlotKey,
  parseSlotKey,
  type BucketId,
  type BucketSnapshot,
  type ContentObject,
  type ReceivePolicy,
  type RenewalFunding,
  type RenewalReceipt,
  type SlotKey,
  type SlotState,
} from "./types";
import { SerialQueue, type Hold } from "./utils/serialQueue";
import { withTimeout } from "./utils/timeout";

export interface CreatedBucket {
  bucket: Bucket;
  capability: AdminCapability;
}

export type BucketPolicyOptions = Omit<BucketOptions, "extensionPeriod" | "extensionUnlockWindow">;

// Failures of the outside world; anything else is a refusal of the caller's request.
const COLLABORATOR_CODES = new Set<BucketErrorCode>([
  "CONTENT_STORE_FAILURE",
  "HANDOFF_RESOLUTION_FAILURE",
  "TIME_SOURCE_FAILURE",
  "COLLABORATOR_TIMEOUT",
  "PERSISTENCE_ERROR",
]);

function keyLabel(key: unknown): string | undefined {
  return typeof key === "bigint" ? key.toString() : undefined;
}

function now(): number {
  return Date.now();
}

function assertPayment(payment: unknown): asserts payment is Payment {
  if (!(payment instanceof Payment)) {
    throw new ValidationFailedError("Expected a Payment");
  }
}

function assertContentObject(object: unknown): asserts object is ContentObject {
  if (
    typeof object !== "object" ||
    object === null ||
    !("id" in object) ||
    typeof object.id !== "string" ||
    !("expirationEpoch" in object) ||
    typeof object.expirationEpoch !== "number" ||
    !Number.isInteger(object.expirationEpoch)
  ) {
    throw new ValidationFailedError("Expected a content object with an id and an integer expiration epoch");
  }
}

function assertEpochs(epochs: number): void {
  if (!Number.isInteger(epochs) || epochs <= 0) {
    throw new ValidationFailedError("Extension epochs must be a positive integer", { epochs });
  }
}

/** Turns a synchronous throw from a collaborator into a rejection. */
function attempt<T>(call: () => Promise<T>): Promise<T> {
  try {
    return call();
  } catch (error) {
    return Promise.reject(error);
  }
}

function contentStoreFailure(error: unknown, key: SlotKey): BucketError {
  if (isBucketError(error)) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ContentStoreFailureError(`Content store call failed: ${reason}`, { key: key.toString() }, error);
}

export class Bucket {
  public readonly id: BucketId;
  public readonly extensionPeriod: number;
  public readonly extensionUnlockWindow: number;
  public readonly renewalFunding: RenewalFunding;
  public readonly receivePolicy: ReceivePolicy;

  private readonly collaboratorTimeoutMs?: number;
  private readonly escrow = new Payment();
  private readonly slots = new Map<SlotKey, ContentObject | null>();
  private readonly queue = new SerialQueue();
  private readonly logger: BucketLogger;
  private readonly metrics: BucketMetrics;

  private constructor(id: BucketId, options: ParsedBucketOptions, dependencies: BucketDependencies) {
    this.id = id;
    this.extensionPeriod = options.extensionPeriod;
    this.extensionUnlockWindow = options.extensionUnlockWindow;
    this.renewalFunding = options.renewalFunding;
    this.receivePolicy = options.receivePolicy;
    this.collaboratorTimeoutMs = options.collaboratorTimeoutMs;
    this.logger =
      dependencies.logger && isBucketLogger(dependencies.logger)
        ? dependencies.logger
        : createBucketLogger({ level: loadConfig().LOG_LEVEL });
    this.metrics = dependencies.metrics ?? new BucketMetrics();
  }

  static create(options: BucketOptions, dependencies: BucketDependencies = {}): CreatedBucket {
    const bucket = new Bucket(randomUUID(), parseBucketOptions(options), dependencies);
    bucket.metrics.setBalance(bucket.id, 0n);
    return { bucket, capability: issueCapability(bucket.id) };
  }

  /**
   * Rebuilds a bucket and its capability from persisted records. `objects`
   * maps each filled slot's object reference to the live object.
   */
  static fromSnapshot(
    snapshot: BucketSnapshot,
    objects: ReadonlyMap<string, ContentObject>,
    policy: BucketPolicyOptions = {},
    dependencies: BucketDependencies = {}
  ): CreatedBucket {
    const { bucket: record, capability } = snapshot;
    if (capability.boundBucket !== record.id) {
      throw new ValidationFailedError("Capability record is bound to a different bucket", {
        bucketId: record.id,
        boundBucket: capability.boundBucket,
      });
    }
    if (!/^[0-9]+$/.test(record.balance)) {
      throw new ValidationFailedError("Balance must be a non-negative decimal string", { balance: record.balance });
    }

    const options = parseBucketOptions({
      ...policy,
      extensionPeriod: record.extensionPeriod,
      extensionUnlockWindow: record.extensionUnlockWindow,
    });
    const bucket = new Bucket(record.id, options, dependencies);
    for (const [rawKey, reference] of Object.entries(record.slots)) {
      const key = parseSlotKey(rawKey);
      if (reference === null) {
        bucket.slots.set(key, null);
        continue;
      }
      const object = objects.get(reference);
      if (!object) {
        throw new ValidationFailedError("Missing content object for persisted slot", { key: rawKey, reference });
      }
      bucket.slots.set(key, object);
    }
    bucket.escrow.join(new Payment(BigInt(record.balance)));
    bucket.metrics.setBalance(bucket.id, bucket.escrow.value);
    return { bucket, capability: issueCapability(record.id, capability.id) };
  }

  get balance(): bigint {
    return this.escrow.value;
  }

  get size(): number {
    return this.slots.size;
  }

  has(key: SlotKey): boolean {
    return this.slots.has(key);
  }

  slotState(key: SlotKey): SlotState {
    if (!this.slots.has(key)) return "absent";
    return this.slots.get(key) ? "filled" : "reserved";
  }

  keys(): SlotKey[] {
    return [...this.slots.keys()];
  }

  assertKeyExists(key: SlotKey): void {
    assertSlotKey(key);
    if (!this.slots.has(key)) {
      throw new KeyNotFoundError(undefined, { bucketId: this.id, key: key.toString() });
    }
  }

  assertFilled(key: SlotKey): void {
    assertSlotKey(key);
    this.filled(key);
  }

  deposit(payment: Payment): Promise<void> {
    return this.execute("deposit", undefined, () => {
      assertPayment(payment);
      this.escrow.join(payment);
      this.metrics.setBalance(this.id, this.escrow.value);
    });
  }

  withdraw(capability: AdminCapability, value: bigint): Promise<Payment> {
    return this.execute("withdraw", undefined, () => {
      this.authorize(capability);
      if (typeof value !== "bigint" || value < 0n) {
        throw new ValidationFailedError("Withdrawal must be a non-negative amount");
      }
      if (value > this.escrow.value) {
        throw new InsufficientBalanceError(undefined, {
          bucketId: this.id,
          requested: value.toString(),
          available: this.escrow.value.toString(),
        });
      }
      const payment = this.escrow.split(value);
      this.metrics.setBalance(this.id, this.escrow.value);
      return payment;
    });
  }

  reserve(capability: AdminCapability, key: SlotKey): Promise<void> {
    return this.execute("reserve", key, () => {
      this.authorize(capability);
      assertSlotKey(key);
      if (this.slots.has(key)) {
        throw new DuplicateKeyError(undefined, { bucketId: this.id, key: key.toString() });
      }
      this.slots.set(key, null);
    });
  }

  add(capability: AdminCapability, key: SlotKey, object: ContentObject): Promise<void> {
    return this.execute("add", key, () => {
      this.authorize(capability);
      assertSlotKey(key);
      assertContentObject(object);
      this.fill(key, object, false);
    });
  }

  /**
   * Pulls an object addressed to this bucket through `handoff` and files it
   * under its `blobId`. Under `auto_reserve` an absent key is created; under
   * `require_reservation` the key must already be reserved. A failed fill
   * reverts the resolution, and so does a resolution that completes after
   * the call timed out.
   */
  receiveAndAdd<TToken>(
    capability: AdminCapability,
    token: TToken,
    handoff: HandoffMechanism<TToken>
  ): Promise<ContentObject> {
    return this.execute("receive_and_add", undefined, async (hold) => {
      this.authorize(capability);
      const resolution = attempt(() => handoff.resolve(token));
      let object: ContentObject;
      try {
        object = await this.awaitCollaborator(resolution, "handoff");
      } catch (error) {
        if (isBucketError(error, "COLLABORATOR_TIMEOUT")) {
          hold(this.revertLateResolution(handoff, token, resolution));
        }
        if (isBucketError(error)) throw error;
        throw new HandoffResolutionFailureError(undefined, { bucketId: this.id }, error);
      }

      try {
        assertContentObject(object);
        assertSlotKey(object.blobId);
        this.fill(object.blobId, object, this.receivePolicy === "auto_reserve");
        return object;
      } catch (error) {
        await this.revertHandoff(handoff, token, object, error);
        throw error;
      }
    });
  }

  borrow(capability: AdminCapability, key: SlotKey): Promise<ContentObject> {
    return this.execute("borrow", key, () => {
      this.authorize(capability);
      assertSlotKey(key);
      return this.filled(key);
    });
  }

  remove(capability: AdminCapability, key: SlotKey): Promise<ContentObject> {
    return this.execute("remove", key, () => {
      this.authorize(capability);
      assertSlotKey(key);
      const object = this.filled(key);
      this.slots.delete(key);
      return object;
    });
  }

  /**
   * Caller-funded extension. No capability is checked: anyone may spend
   * their own payment on a key held here. Leftover stays in `payment`.
   * After a timeout the bucket stays closed until the store call settles.
   */
  renewWithPayment(
    key: SlotKey,
    extensionEpochs: number,
    payment: Payment,
    contentStore: ContentStore
  ): Promise<RenewalReceipt> {
    return this.execute("renew_with_payment", key, async (hold) => {
      assertSlotKey(key);
      assertEpochs(extensionEpochs);
      assertPayment(payment);
      const object = this.filled(key);
      const previousExpiration = object.expirationEpoch;
      const offered = payment.value;
      const rollback = () => {
        object.expirationEpoch = previousExpiration;
      };

      const extension = attempt(() => contentStore.extend(object, extensionEpochs, payment));
      try {
        await this.awaitCollaborator(extension, "content_store");
      } catch (error) {
        if (isBucketError(error, "COLLABORATOR_TIMEOUT")) {
          hold(this.settleLateExtension("renew_with_payment", key, extension, () => undefined, rollback));
        } else {
          rollback();
        }
        throw contentStoreFailure(error, key);
      }

      return {
        key,
        previousExpiration,
        newExpiration: object.expirationEpoch,
        withdrawn: offered,
        spent: offered - payment.value,
        refunded: payment.value,
      };
    });
  }

  /**
   * Escrow-funded extension by `extensionPeriod`, allowed once the current
   * epoch reaches `expirationEpoch - extensionUnlockWindow`. Callable by
   * anyone. When the store call times out, the withdrawn payment stays out
   * of escrow and the bucket stays closed until the call settles; the late
   * outcome is then booked as a renewal or rolled back.
   */
  renew(key: SlotKey, contentStore: ContentStore, timeSource: TimeSource): Promise<RenewalReceipt> {
    return this.execute("renew", key, async (hold) => {
      assertSlotKey(key);
      const object = this.filled(key);
      const currentEpoch = await this.currentEpoch(timeSource);
      const opensAt = object.expirationEpoch - this.extensionUnlockWindow;
      if (currentEpoch < opensAt) {
        throw new OutsideUnlockWindowError(undefined, {
          bucketId: this.id,
          key: key.toString(),
          currentEpoch,
          expirationEpoch: object.expirationEpoch,
          opensAt,
        });
      }

      const amount = await this.renewalAmount(contentStore, object, key);
      const payment = this.escrow.split(amount);
      const previousExpiration = object.expirationEpoch;
      const book = (): RenewalReceipt => {
        const refunded = payment.value;
        this.escrow.join(payment);
        const spent = amount - refunded;
        this.metrics.recordRenewalSpend(spent);
        this.metrics.setBalance(this.id, this.escrow.value);
        return {
          key,
          previousExpiration,
          newExpiration: object.expirationEpoch,
          withdrawn: amount,
          spent,
          refunded,
        };
      };
      const rollback = () => {
        this.escrow.join(payment);
        object.expirationEpoch = previousExpiration;
        this.metrics.setBalance(this.id, this.escrow.value);
      };

      const extension = attempt(() => contentStore.extend(object, this.extensionPeriod, payment));
      try {
        await this.awaitCollaborator(extension, "content_store");
      } catch (error) {
        if (isBucketError(error, "COLLABORATOR_TIMEOUT")) {
          hold(this.settleLateExtension("renew", key, extension, book, rollback));
        } else {
          rollback();
        }
        throw contentStoreFailure(error, key);
      }
      return book();
    });
  }

  /** Persistable records for this bucket and its capability. */
  snapshot(capability: AdminCapability): Promise<BucketSnapshot> {
    return this.execute("snapshot", undefined, () => {
      this.authorize(capability);
      const slots: Record<string, string | null> = {};
      for (const [key, object] of this.slots) {
        slots[key.toString()] = object ? object.id : null;
      }
      return {
        bucket: {
          id: this.id,
          extensionPeriod: this.extensionPeriod,
          extensionUnlockWindow: this.extensionUnlockWindow,
          balance: this.escrow.value.toString(),
          slots,
        },
        capability: capability.toRecord(),
      };
    });
  }

  private authorize(capability: AdminCapability): void {
    if (!authorizes(capability, this.id)) {
      throw new UnauthorizedError(undefined, { bucketId: this.id });
    }
  }

  private filled(key: SlotKey): ContentObject {
    if (!this.slots.has(key)) {
      throw new KeyNotFoundError(undefined, { bucketId: this.id, key: key.toString() });
    }
    const object = this.slots.get(key);
    if (!object) {
      throw new SlotEmptyError(undefined, { bucketId: this.id, key: key.toString() });
    }
    return object;
  }

  private fill(key: SlotKey, object: ContentObject, reserveIfAbsent: boolean): void {
    if (!this.slots.has(key)) {
      if (!reserveIfAbsent) {
        throw new KeyNotReservedError(undefined, { bucketId: this.id, key: key.toString() });
      }
    } else if (this.slots.get(key)) {
      throw new AlreadyFilledError(undefined, { bucketId: this.id, key: key.toString() });
    }
    this.slots.set(key, object);
  }

  private async revertHandoff<TToken>(
    handoff: HandoffMechanism<TToken>,
    token: TToken,
    object: ContentObject,
    reason: unknown
  ): Promise<void> {
    try {
      await this.awaitCollaborator(
        attempt(() => handoff.revert(token, object)),
        "handoff"
      );
    } catch (error) {
      throw new HandoffResolutionFailureError(
        "Handoff could not be reverted after a rejected fill",
        { bucketId: this.id, rejectedWith: isBucketError(reason) ? reason.code : "UNKNOWN" },
        error
      );
    }
  }

  private async currentEpoch(timeSource: TimeSource): Promise<number> {
    let epoch: number;
    try {
      epoch = await this.awaitCollaborator(
        attempt(() => timeSource.currentEpoch()),
        "time_source"
      );
    } catch (error) {
      if (isBucketError(error)) throw error;
      throw new TimeSourceFailureError(undefined, { bucketId: this.id }, error);
    }
    if (!Number.isInteger(epoch) || epoch < 0) {
      throw new TimeSourceFailureError("Time source returned an invalid epoch", { bucketId: this.id, epoch });
    }
    return epoch;
  }

  private async renewalAmount(contentStore: ContentStore, object: ContentObject, key: SlotKey): Promise<bigint> {
    if (this.renewalFunding === "full_balance") {
      return this.escrow.value;
    }
    if (!contentStore.quoteExtension) {
      throw new ContentStoreFailureError("Content store cannot quote extensions", {
        bucketId: this.id,
        key: key.toString(),
      });
    }
    const quoteExtension = contentStore.quoteExtension.bind(contentStore);
    let quote: bigint;
    try {
      quote = await this.awaitCollaborator(
        attempt(() => quoteExtension(object, this.extensionPeriod)),
        "content_store"
      );
    } catch (error) {
      throw contentStoreFailure(error, key);
    }
    if (typeof quote !== "bigint" || quote < 0n) {
      throw new ContentStoreFailureError("Content store returned an invalid quote", {
        bucketId: this.id,
        key: key.toString(),
      });
    }
    if (quote > this.escrow.value) {
      throw new InsufficientBalanceError("Balance does not cover the quoted renewal cost", {
        bucketId: this.id,
        key: key.toString(),
        quoted: quote.toString(),
        available: this.escrow.value.toString(),
      });
    }
    return quote;
  }

  private awaitCollaborator<T>(call: Promise<T>, collaborator: string): Promise<T> {
    return withTimeout(call, this.collaboratorTimeoutMs, { bucketId: this.id, collaborator });
  }

  /** Books or rolls back a store call that settled after its caller saw a timeout. */
  private settleLateExtension(
    op: string,
    key: SlotKey,
    extension: Promise<void>,
    book: () => unknown,
    rollback: () => void
  ): Promise<void> {
    const start = now();
    const settledOp = `${op}_settled`;
    const baseLog = { op: settledOp, bucketId: this.id, key: key.toString() };
    return extension.then(
      () => {
        book();
        const durationMs = now() - start;
        this.metrics.recordOperation(settledOp, "extended", durationMs);
        this.logger.warn({ ...baseLog, durationMs, outcome: "extended" });
      },
      (error: unknown) => {
        rollback();
        const durationMs = now() - start;
        const code = contentStoreFailure(error, key).code;
        this.metrics.recordOperation(settledOp, code, durationMs);
        this.logger.warn({ ...baseLog, durationMs, code, outcome: "rolled_back" });
      }
    );
  }

  /** Hands back an object whose resolution completed after its caller saw a timeout. */
  private revertLateResolution<TToken>(
    handoff: HandoffMechanism<TToken>,
    token: TToken,
    resolution: Promise<ContentObject>
  ): Promise<void> {
    const start = now();
    const settledOp = "receive_and_add_settled";
    const baseLog = { op: settledOp, bucketId: this.id };
    return resolution.then(
      async (object) => {
        try {
          await this.awaitCollaborator(
            attempt(() => handoff.revert(token, object)),
            "handoff"
          );
          const durationMs = now() - start;
          this.metrics.recordOperation(settledOp, "reverted", durationMs);
          this.logger.warn({ ...baseLog, durationMs, outcome: "reverted" });
        } catch (error) {
          const durationMs = now() - start;
          const code = isBucketError(error) ? error.code : "HANDOFF_RESOLUTION_FAILURE";
          this.metrics.recordOperation(settledOp, code, durationMs);
          this.logger.error({ ...baseLog, durationMs, code, objectId: object.id });
        }
      },
      () => {
        const durationMs = now() - start;
        this.metrics.recordOperation(settledOp, "unresolved", durationMs);
        this.logger.warn({ ...baseLog, durationMs, outcome: "unresolved" });
      }
    );
  }

  private execute<T>(op: string, key: SlotKey | undefined, task: (hold: Hold) => Promise<T> | T): Promise<T> {
    return this.queue.run(async (hold) => {
      const start = now();
      const baseLog = { op, bucketId: this.id, key: keyLabel(key) };
      this.logger.debug(baseLog);
      try {
        const result = await task(hold);
        const durationMs = now() - start;
        this.metrics.recordOperation(op, "ok", durationMs);
        this.logger.info({ ...baseLog, durationMs });
        return result;
      } catch (error) {
        const durationMs = now() - start;
        const code = isBucketError(error) ? error.code : "UNKNOWN";
        this.metrics.recordOperation(op, code, durationMs);
        if (isBucketError(error) && !COLLABORATOR_CODES.has(error.code)) {
          this.logger.warn({ ...baseLog, durationMs, code });
        } else {
          this.logger.error({ ...baseLog, durationMs, code });
        }
        throw error;
      }
    });
  }
}

export function createBucket(options: BucketOptions, dependencies: BucketDependencies = {}): CreatedBucket {
  return Bucket.create(options, dependencies);
}
