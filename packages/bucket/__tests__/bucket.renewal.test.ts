import { describe, expect, it, vi } from "vitest";
import { createBucket } from "../src/bucket";
import type { BucketOptions } from "../src/config";
import type { ContentStore, TimeSource } from "../src/collaborators";
import {
  CollaboratorTimeoutError,
  ContentStoreFailureError,
  InsufficientBalanceError,
  KeyNotFoundError,
  OutsideUnlockWindowError,
  SlotEmptyError,
  TimeSourceFailureError,
  ValidationFailedError,
} from "../src/errors";
import { BucketMetrics } from "../src/observability/metrics";
import { Payment } from "../src/payment";
import {
  InMemoryContentStore,
  ManualTimeSource,
  SlowContentStore,
  createMockLogger,
  makeObject,
} from "../tests/support/fakes";

const setup = async (overrides: Partial<BucketOptions> = {}, deposit = 100n) => {
  const logger = createMockLogger();
  const metrics = new BucketMetrics();
  const { bucket, capability } = createBucket(
    { extensionPeriod: 10, extensionUnlockWindow: 3, ...overrides },
    { logger, metrics }
  );
  await bucket.deposit(new Payment(deposit));
  const object = makeObject(42n, 50);
  await bucket.reserve(capability, 42n);
  await bucket.add(capability, 42n, object);
  return { bucket, capability, object, logger, metrics, store: new InMemoryContentStore(1n) };
};

describe("self-funded renewal", () => {
  it("waits for the unlock window, then spends only the extension cost", async () => {
    const { bucket, object, store } = await setup();
    const clock = new ManualTimeSource(46);

    const early = bucket.renew(42n, store, clock);
    await expect(early).rejects.toBeInstanceOf(OutsideUnlockWindowError);
    await expect(early).rejects.toMatchObject({
      metadata: { currentEpoch: 46, expirationEpoch: 50, opensAt: 47 },
    });
    expect(store.extendCalls).toHaveLength(0);

    clock.epoch = 48;
    const receipt = await bucket.renew(42n, store, clock);
    expect(receipt).toEqual({
      key: 42n,
      previousExpiration: 50,
      newExpiration: 60,
      withdrawn: 100n,
      spent: 10n,
      refunded: 90n,
    });
    expect(bucket.balance).toBe(90n);
    expect(object.expirationEpoch).toBe(60);
    expect(store.collected.value).toBe(10n);
  });

  it("opens exactly at expiration minus the window", async () => {
    const { bucket, store } = await setup();
    const receipt = await bucket.renew(42n, store, new ManualTimeSource(47));
    expect(receipt.newExpiration).toBe(60);
  });

  it("stays open after expiration has passed", async () => {
    const { bucket, store } = await setup();
    const receipt = await bucket.renew(42n, store, new ManualTimeSource(75));
    expect(receipt.previousExpiration).toBe(50);
    expect(receipt.newExpiration).toBe(60);
  });

  it("refuses reserved and absent keys before reading the clock", async () => {
    const { bucket, capability, store } = await setup();
    await bucket.reserve(capability, 7n);
    const clock: TimeSource = { currentEpoch: vi.fn(async () => 100) };
    await expect(bucket.renew(7n, store, clock)).rejects.toBeInstanceOf(SlotEmptyError);
    await expect(bucket.renew(8n, store, clock)).rejects.toBeInstanceOf(KeyNotFoundError);
    expect(clock.currentEpoch).not.toHaveBeenCalled();
  });

  it("rolls back balance and expiration when the store fails", async () => {
    const { bucket, object, store, logger } = await setup();
    const cause = new Error("store unavailable");
    store.failNext = cause;

    const attempt = bucket.renew(42n, store, new ManualTimeSource(48));
    await expect(attempt).rejects.toBeInstanceOf(ContentStoreFailureError);
    await expect(attempt).rejects.toHaveProperty("cause", cause);
    await expect(attempt).rejects.toThrow("Content store call failed: store unavailable");
    expect(store.extendCalls).toEqual([{ objectId: object.id, epochs: 10, offered: 100n }]);
    expect(bucket.balance).toBe(100n);
    expect(object.expirationEpoch).toBe(50);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ op: "renew", key: "42", code: "CONTENT_STORE_FAILURE" })
    );
  });

  it("times out a slow store and rolls back once the call fails", async () => {
    const { bucket, capability, object } = await setup({ collaboratorTimeoutMs: 20 });
    const store = new SlowContentStore(60, 1, "fail");
    const clock = new ManualTimeSource(48);

    const attempt = bucket.renew(42n, store, clock);
    await expect(attempt).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await expect(attempt).rejects.toMatchObject({ retryable: true, metadata: { collaborator: "content_store", timeoutMs: 20 } });

    await bucket.withdraw(capability, 0n);
    expect(bucket.balance).toBe(100n);
    expect(object.expirationEpoch).toBe(50);
    expect(store.collected.value).toBe(0n);

    const receipt = await bucket.renew(42n, store, clock);
    expect(receipt.spent).toBe(10n);
    expect(bucket.balance).toBe(90n);
  });

  it("books a renewal whose store call completes after the timeout", async () => {
    const { bucket, capability, object, logger, metrics } = await setup({ collaboratorTimeoutMs: 20 });
    const store = new SlowContentStore(60, 1, "extend");
    const clock = new ManualTimeSource(48);

    await expect(bucket.renew(42n, store, clock)).rejects.toBeInstanceOf(CollaboratorTimeoutError);

    await bucket.withdraw(capability, 0n);
    expect(bucket.balance).toBe(90n);
    expect(object.expirationEpoch).toBe(60);
    expect(store.collected.value).toBe(10n);
    expect(await metrics.getRegistry().metrics()).toContain("bucket_renewal_spend_total 10");
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ op: "renew_settled", key: "42", outcome: "extended" })
    );

    await expect(bucket.renew(42n, store, clock)).rejects.toBeInstanceOf(OutsideUnlockWindowError);
    expect(store.extendCalls).toHaveLength(1);
    expect(bucket.balance).toBe(90n);
  });

  it("fails with InsufficientBalance when the escrow is empty", async () => {
    const { bucket, object, store } = await setup({}, 0n);
    await expect(bucket.renew(42n, store, new ManualTimeSource(48))).rejects.toBeInstanceOf(
      InsufficientBalanceError
    );
    expect(bucket.balance).toBe(0n);
    expect(object.expirationEpoch).toBe(50);
  });

  it("does not touch other keys", async () => {
    const { bucket, capability, store } = await setup();
    const other = makeObject(43n, 80);
    await bucket.reserve(capability, 43n);
    await bucket.add(capability, 43n, other);

    await bucket.renew(42n, store, new ManualTimeSource(48));
    expect(other.expirationEpoch).toBe(80);
    await expect(bucket.renew(43n, store, new ManualTimeSource(48))).rejects.toBeInstanceOf(
      OutsideUnlockWindowError
    );
  });

  it("reports time source failures", async () => {
    const { bucket, store } = await setup();
    const broken: TimeSource = {
      currentEpoch: async () => {
        throw new Error("clock offline");
      },
    };
    await expect(bucket.renew(42n, store, broken)).rejects.toBeInstanceOf(TimeSourceFailureError);
    await expect(bucket.renew(42n, store, new ManualTimeSource(-1))).rejects.toBeInstanceOf(TimeSourceFailureError);
    expect(store.extendCalls).toHaveLength(0);
  });

  it("records renewal spend", async () => {
    const { bucket, store, metrics } = await setup();
    await bucket.renew(42n, store, new ManualTimeSource(48));
    const output = await metrics.getRegistry().metrics();
    expect(output).toContain("bucket_renewal_spend_total 10");
    expect(output).toContain(`bucket_balance_units{bucket="${bucket.id}"} 90`);
  });
});

describe("quoted-cost renewal", () => {
  it("withdraws only the quoted amount", async () => {
    const { bucket, store } = await setup({ renewalFunding: "quoted_cost" });
    const receipt = await bucket.renew(42n, store, new ManualTimeSource(48));
    expect(receipt).toMatchObject({ withdrawn: 10n, spent: 10n, refunded: 0n });
    expect(store.extendCalls[0]?.offered).toBe(10n);
    expect(bucket.balance).toBe(90n);
  });

  it("refuses when the quote exceeds the balance", async () => {
    const { bucket, store } = await setup({ renewalFunding: "quoted_cost" }, 5n);
    await expect(bucket.renew(42n, store, new ManualTimeSource(48))).rejects.toBeInstanceOf(
      InsufficientBalanceError
    );
    expect(store.extendCalls).toHaveLength(0);
    expect(bucket.balance).toBe(5n);
  });

  it("needs a store that can quote", async () => {
    const { bucket } = await setup({ renewalFunding: "quoted_cost" });
    const store: ContentStore = { extend: vi.fn(async () => undefined) };
    await expect(bucket.renew(42n, store, new ManualTimeSource(48))).rejects.toBeInstanceOf(
      ContentStoreFailureError
    );
    expect(store.extend).not.toHaveBeenCalled();
    expect(bucket.balance).toBe(100n);
  });
});

describe("caller-funded renewal", () => {
  it("extends with the caller's payment and leaves the change in it", async () => {
    const { bucket, object, store } = await setup();
    const payment = new Payment(25n);
    const receipt = await bucket.renewWithPayment(42n, 5, payment, store);
    expect(receipt).toEqual({
      key: 42n,
      previousExpiration: 50,
      newExpiration: 55,
      withdrawn: 25n,
      spent: 5n,
      refunded: 20n,
    });
    expect(payment.value).toBe(20n);
    expect(object.expirationEpoch).toBe(55);
    expect(bucket.balance).toBe(100n);
  });

  it("ignores the unlock window", async () => {
    const { bucket, store } = await setup();
    await expect(bucket.renewWithPayment(42n, 1, new Payment(1n), store)).resolves.toMatchObject({
      newExpiration: 51,
    });
  });

  it("surfaces an underfunded payment without changing the object", async () => {
    const { bucket, object, store } = await setup();
    const payment = new Payment(3n);
    await expect(bucket.renewWithPayment(42n, 5, payment, store)).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(payment.value).toBe(3n);
    expect(object.expirationEpoch).toBe(50);
  });

  it("settles a caller-funded extension that completes after the timeout", async () => {
    const { bucket, capability, object } = await setup({ collaboratorTimeoutMs: 20 });
    const payment = new Payment(25n);
    const store = new SlowContentStore(60, 1, "extend");

    await expect(bucket.renewWithPayment(42n, 5, payment, store)).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await bucket.withdraw(capability, 0n);
    expect(payment.value).toBe(20n);
    expect(object.expirationEpoch).toBe(55);
    expect(bucket.balance).toBe(100n);
  });

  it("restores the expiration when a timed-out caller-funded extension fails", async () => {
    const { bucket, capability, object } = await setup({ collaboratorTimeoutMs: 20 });
    const payment = new Payment(25n);

    await expect(
      bucket.renewWithPayment(42n, 5, payment, new SlowContentStore(60, 1, "fail"))
    ).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await bucket.withdraw(capability, 0n);
    expect(payment.value).toBe(25n);
    expect(object.expirationEpoch).toBe(50);
  });

  it("rejects non-positive extensions", async () => {
    const { bucket, store } = await setup();
    await expect(bucket.renewWithPayment(42n, 0, new Payment(5n), store)).rejects.toBeInstanceOf(
      ValidationFailedError
    );
    expect(store.extendCalls).toHaveLength(0);
  });
});
